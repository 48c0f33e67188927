export { createBridge, type Bridge, type BridgeDeps } from './bridge.js';
export { createMcpServer, RESOURCE_NOT_FOUND, SERVER_INFO } from './mcp-server.js';
export { createStatusServer, EventRing } from './api/server.js';
export { loadConfig, readConfigFile, DEFAULT_CONFIG_FILE, type BridgeConfig } from './core/config.js';
export { createLogger } from './core/logger.js';
export * from './core/errors.js';
export * from './core/types.js';
export { SessionStore, type Freshness, type RefreshResult } from './core/store.js';
export { StatusSynchronizer, computeSyncDelay } from './core/synchronizer.js';
export { ProtocolDispatcher, toErrorPayload, type ToolResult } from './core/dispatcher.js';
export { ToolRegistry, createDefaultRegistry } from './core/registry.js';
export { BackendGateway, computeRetryDelay } from './infra/gateway.js';
export { applyConfigChange, startConfigWatcher } from './infra/watcher.js';
export { formatStatusLine, formatTaskTree } from './core/report.js';
