#!/usr/bin/env node
import { getAppConfig } from '@addrbridge/env';
import { ConsoleSink, flushLoggers, getLogger, initLogger } from '@addrbridge/logger';
import { Command } from 'commander';

import { registerBatchCommand } from './features/batch/batch.js';
import { registerConvertCommands } from './features/convert/convert.js';
import { registerListChainsCommand } from './features/list-chains/list-chains.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { OutputManager } from './features/shared/output.js';
import { registerVariantsCommands } from './features/variants/variants.js';

const logger = getLogger('CLI');
const program = new Command();

async function main(): Promise<void> {
  const configResult = getAppConfig();
  if (configResult.isErr()) {
    const json = process.argv.includes('--json');
    new OutputManager(json ? 'json' : 'text').error('startup', configResult.error, ExitCodes.CONFIG_ERROR);
    return;
  }

  const config = configResult.value;
  initLogger({ level: config.logLevel, sinks: [new ConsoleSink({ color: process.stderr.isTTY })] });
  logger.debug({ targetPrefix: config.targetPrefix, maxBatchSize: config.maxBatchSize }, 'Configuration loaded');

  program
    .name('addrbridge')
    .description('Convert account addresses between EVM hex and Cosmos bech32 formats')
    .version('0.1.0');

  // convert, evm-to-inj, inj-to-evm
  registerConvertCommands(program, config);

  // to-prefix, variants
  registerVariantsCommands(program, config);

  registerBatchCommand(program, config);
  registerListChainsCommand(program, config);

  await program.parseAsync(process.argv);
  flushLoggers();
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Unhandled CLI error');
  flushLoggers();
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(ExitCodes.GENERAL_ERROR);
});
