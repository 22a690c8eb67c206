/**
 * Environment diagnostics script
 *
 * Usage: npm run env:diag
 *
 * Prints where .env was loaded from and which crawl settings are present,
 * without starting a crawl
 */

import { initEnv, getEnvDiagnostics, validateRequiredEnv } from '@citewalk/config';

const REQUIRED_KEYS = ['ANTHROPIC_API_KEY', 'SCOPUS_API_KEY'] as const;
const OPTIONAL_KEYS = ['LOG_LEVEL', 'ANTHROPIC_BASE_URL', 'SCOPUS_BASE_URL', 'HTTPS_PROXY', 'HTTP_PROXY'] as const;

const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from .env: ${keysLoaded.length}`);

const diagnostics = getEnvDiagnostics([...REQUIRED_KEYS, ...OPTIONAL_KEYS]);

console.log('\n📋 Environment Variables Status:');
for (const key of diagnostics.requiredKeys) {
  const status = key.present ? '✅' : '❌';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${masked}${source}`);
}

const { valid, missing } = validateRequiredEnv(REQUIRED_KEYS);

console.log('\n📊 Structured Output (JSON):');
console.log(
  JSON.stringify(
    {
      event: 'env.diagnostics',
      envFilePath,
      envFileExists: loaded,
      envLocalFileExists: localLoaded,
      keysLoadedCount: keysLoaded.length,
      crawlReady: valid,
      missing,
      variables: diagnostics.requiredKeys.map(k => ({ key: k.key, present: k.present, source: k.source })),
      warnings: diagnostics.warnings,
    },
    null,
    2
  )
);

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}
