#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { FSWatcher } from 'chokidar';
import type { FastifyInstance } from 'fastify';
import pino from 'pino';
import { createStatusServer } from './api/server.js';
import { createBridge } from './bridge.js';
import { loadConfig, resolveConfigPath } from './core/config.js';
import { createLogger } from './core/logger.js';
import { createMcpServer } from './mcp-server.js';
import { startConfigWatcher } from './infra/watcher.js';

async function main() {
  const cfg = loadConfig(process.env);
  // stdout carries the protocol
  const log = createLogger(cfg, pino.destination(2));

  const bridge = createBridge(cfg, { log });
  const server = createMcpServer(bridge.dispatcher);

  let watcher: FSWatcher | null = null;
  if (cfg.TASKLINK_WATCH_CONFIG && process.env.TASKLINK_API_TOKEN === undefined) {
    const configPath = resolveConfigPath(cfg.TASKLINK_CONFIG_FILE);
    watcher = startConfigWatcher(configPath, bridge, log.child({ component: 'watcher' }));
    log.info({ configPath }, 'watching config file for credential changes');
  }

  let statusApp: FastifyInstance | null = null;
  if (cfg.TASKLINK_STATUS_ENABLED) {
    statusApp = await createStatusServer(cfg, {
      store: bridge.store,
      synchronizer: bridge.synchronizer,
      log: log.child({ component: 'status-api' })
    });
    const addr = await statusApp.listen({ port: cfg.TASKLINK_STATUS_PORT, host: cfg.TASKLINK_STATUS_BIND });
    log.info({ addr }, 'status api listening');
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down...');
    await bridge.stop();
    if (watcher) await watcher.close();
    if (statusApp) await statusApp.close();
    await server.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
  server.onclose = () => onSignal('transport-close');

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ projectId: cfg.TASKLINK_PROJECT_ID, tools: bridge.registry.listTools().length }, 'tasklink MCP server running on stdio');

  await bridge.start();
}

main().catch((err) => {
  console.error('tasklink MCP server error:', err);
  process.exit(1);
});
