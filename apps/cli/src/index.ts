/**
 * citewalk CLI
 *
 * Usage: citewalk --seed-paper paper.pdf --keywords "beetle,spider"
 */

import { initEnv, optionalEnv } from '@citewalk/config';
import { createSpeciesExtractor, createLlmClient } from '@citewalk/llm';
import { PdfTextExtractor } from '@citewalk/pdf';
import { createScopusClient, createScopusReferenceSource } from '@citewalk/scopus';
import { createCliLogger } from './logger.js';
import { USAGE, parseCliArgs } from './options.js';
import { configureProxy } from './proxy.js';
import { runCrawl } from './run.js';
import { createCrawlTextSource } from './text-source.js';

initEnv();

const logger = createCliLogger();

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'error') {
    console.error(`❌ Error: ${parsed.message}\n`);
    console.error(USAGE);
    return 1;
  }

  const { options, outputPath } = parsed;
  configureProxy(process.env, logger);

  const scopus = createScopusClient({ apiKey: options.scopusKey, baseUrl: optionalEnv('SCOPUS_BASE_URL') });
  const llm = createLlmClient({
    provider: 'ANTHROPIC',
    apiKey: options.claudeKey,
    baseUrl: optionalEnv('ANTHROPIC_BASE_URL'),
  });

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    logger.warn({ event: 'run.cancel', signal }, 'Cancelling after the current paper');
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const { exitCode } = await runCrawl(
      options,
      outputPath,
      {
        textSource: createCrawlTextSource({ pdf: new PdfTextExtractor(), scopus }),
        extractor: createSpeciesExtractor(llm),
        referenceSource: createScopusReferenceSource(scopus),
        logger,
      },
      controller.signal
    );
    return exitCode;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
  }
}

main()
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal(
      { event: 'run.fail', error: error instanceof Error ? error.message : String(error) },
      'Run failed'
    );
    process.exitCode = 1;
  });
