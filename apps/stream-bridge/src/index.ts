/**
 * Public API of the stream bridge
 */
export { StreamBridge, BRIDGE_DONE } from './modules/StreamBridge.js';
export type { StreamBridgeOptions, StreamBridgeEvents } from './modules/StreamBridge.js';
export { SignalSource } from './modules/SignalSource.js';
export { SocketTransport, encodePcm16 } from './services/socket-transport.service.js';
export { loadConfig, validateConfig, getConfig, toBridgeConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './utils/errors.js';
export type * from './types/index.js';
export type { SessionHandle, Transport } from './types/transport.js';
