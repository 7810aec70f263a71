import { InvalidArgumentError } from 'commander';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { RetryPolicy } from '../pagination/paginator.js';
import { OutputStream } from '../progress.js';
import { MailProvider } from '../providers/base.js';

const logger = createLogger('CLI');

export interface CommandIO {
  stdout: OutputStream;
  stderr: OutputStream;
}

export interface CommandDeps extends CommandIO {
  provider: MailProvider;
  retry?: Partial<RetryPolicy>;
  now?: () => Date;
}

/** Run a command body, turning any error into a one-line report and exit code 1. */
export async function runCommand(io: CommandIO, body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (error) {
    logger.debug('Command failed:', error);
    io.stderr.write(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}
