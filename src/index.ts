#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config, loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createLogger, setLogLevel } from './logger.js';
import { createProvider } from './providers/index.js';
import { createServer } from './server.js';

const logger = createLogger('MCP');

let config: Config;
try {
  config = loadConfig({ logLevel: 'info' });
} catch (error) {
  logger.error(errorMessage(error));
  process.exit(1);
}
setLogLevel(config.logLevel);

logger.info('Starting mail-sweep MCP server...');
const server = createServer({ provider: createProvider(config) });

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('mail-sweep MCP server running');
