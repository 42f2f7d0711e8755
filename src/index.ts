#!/usr/bin/env node

// External packages
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config as loadEnv } from 'dotenv';

// Local modules
import { registerResearchCatalog } from './catalog/index.js';
import { loadConfig } from './config.js';
import { Dispatcher } from './dispatcher.js';
import { logger, toError } from './logger.js';
import { CapabilityRegistry } from './registry.js';
import { CliResearchBackend } from './research-backend.js';
import { createCapabilityServer } from './server.js';

loadEnv();

// Run the server via stdio
async function runServer(): Promise<void> {
  // Configuration or catalog errors throw here and abort startup
  const serverConfig = loadConfig();
  logger.setLogLevel(serverConfig.logLevel);

  const registry = new CapabilityRegistry();
  registerResearchCatalog(registry, new CliResearchBackend());
  registry.seal();

  const dispatcher = new Dispatcher(registry, { config: serverConfig, logger });
  const server = createCapabilityServer(dispatcher, serverConfig);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`, 'runServer');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error while closing server', 'runServer', toError(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(
    `${serverConfig.server.name} running on stdio with ${registry.size('operation')} tools, ` +
    `${registry.size('resource')} resources and ${registry.size('prompt')} prompts`,
    'runServer'
  );
}

runServer().catch((error: unknown) => {
  logger.error('Fatal error running server', 'main', toError(error));
  process.exit(1);
});
