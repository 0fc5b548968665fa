import { isDevelopment } from '@addrbridge/env';
import { flushLoggers } from '@addrbridge/logger';
import * as p from '@clack/prompts';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse } from './cli-response.js';
import { ExitCodes, exitCodeToErrorCode, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  VALIDATION_ERROR:
    'Addresses must be 0x followed by 40 hex characters, or a lowercase bech32 address such as inj1..., cosmos1... or osmo1....',
  CONFIG_ERROR: 'Check the ADDRBRIDGE_* environment variables.',
};

/**
 * Renders command results as human-readable text or as a JSON envelope on stdout.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Write the success envelope (JSON mode only).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Report an error and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout, so callers can parse it
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2));
    } else {
      p.log.error(`${pc.red('Error')}: ${error.message}`);
      const tip = ERROR_TIPS[errorCode];
      if (tip) {
        p.log.message(pc.dim(tip));
      }
      if (isDevelopment() && error.stack) {
        p.log.message(pc.dim(error.stack));
      }
    }

    flushLoggers();
    process.exit(exitCode);
  }

  /** Text mode only. */
  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  /** Text mode only. */
  info(message: string): void {
    if (this.format === 'text') {
      p.log.info(message);
    }
  }

  /** Text mode: yellow warning. JSON mode: nothing, the envelope carries the data. */
  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    }
  }
}
