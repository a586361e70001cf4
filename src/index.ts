#!/usr/bin/env node
/**
 * Model Conclave entry point — STDIO transport.
 */
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { createConclave } from './orchestrator.js';
import { loadConfig } from './config.js';
import { logger, setLogMode } from './logger.js';

// stdout carries the MCP protocol; anything logged goes to stderr.
console.log = console.error;
console.info = console.error;

async function main(): Promise<void> {
  const loaded = loadConfig(process.argv[2]);
  setLogMode(loaded.logging.level);

  // No retrieval collaborator is wired into the standalone server.
  const config = { ...loaded, features: { ...loaded.features, rag: false } };
  if (loaded.features.rag) logger.info('Conclave: no retrieval backend configured, RAG disabled');

  const conclave = createConclave({ config });
  const server = createServer(conclave);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Conclave: server ready', { data_path: config.storage.base_path, cache: config.cache.store });

  const shutdown = async (): Promise<void> => {
    await server.close();
    await conclave.close();
    process.exit(0);
  };
  process.on('SIGINT', () => { shutdown().catch((err: unknown) => { console.error('Shutdown failed:', err); process.exit(1); }); });
  process.on('SIGTERM', () => { shutdown().catch((err: unknown) => { console.error('Shutdown failed:', err); process.exit(1); }); });
}

main().catch((err: unknown) => { console.error('Model Conclave failed:', err); process.exit(1); });
