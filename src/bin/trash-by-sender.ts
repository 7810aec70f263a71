#!/usr/bin/env node
import { Command } from 'commander';
import { parseNonNegativeInt, runCommand } from '../commands/run.js';
import { runTrashBySender } from '../commands/trash-by-sender.js';
import { loadConfig } from '../config.js';
import { setLogLevel } from '../logger.js';
import { createProvider } from '../providers/index.js';

const program = new Command()
  .name('trash-by-sender')
  .description('Move all emails from a sender to Trash')
  .argument('<sender>', 'Email address of the sender')
  .option('--dry-run', 'Show what would be moved without doing it', false)
  .option('--limit <count>', 'Max number of emails to move (0 = all)', parseNonNegativeInt, 0)
  .parse();

const [sender] = program.args;
const options = program.opts<{ dryRun: boolean; limit: number }>();
const io = { stdout: process.stdout, stderr: process.stderr };

process.exitCode = await runCommand(io, async () => {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return runTrashBySender(
    { ...io, provider: createProvider(config) },
    { sender, dryRun: options.dryRun, limit: options.limit }
  );
});
