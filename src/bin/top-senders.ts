#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand, parsePositiveInt } from '../commands/run.js';
import { runTopSenders } from '../commands/top-senders.js';
import { loadConfig } from '../config.js';
import { setLogLevel } from '../logger.js';
import { createProvider } from '../providers/index.js';

const program = new Command()
  .name('top-senders')
  .description('Show the top email senders across all mailboxes')
  .option('-n <count>', 'Number of top senders to show', parsePositiveInt, 25)
  .option('--months <months>', 'How many months back to look (30-day months)', parsePositiveInt, 6)
  .parse();

const options = program.opts<{ n: number; months: number }>();
const io = { stdout: process.stdout, stderr: process.stderr };

process.exitCode = await runCommand(io, async () => {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return runTopSenders(
    { ...io, provider: createProvider(config) },
    { count: options.n, months: options.months }
  );
});
