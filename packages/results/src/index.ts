export * from './csv.js';
export * from './summary.js';
