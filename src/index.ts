export { DiscoveryError, ValidationError, type ErrorContext } from './domain/errors/DiscoveryError.js';
export type {
  DiscoveryResult,
  RESTDiscoveryResult,
  WebsocketDiscoveryResult,
} from './domain/entities/Discovery.js';
export { EntityStateSchema, getEntityDomain, type EntityState, type EntityDomain } from './domain/entities/Entity.js';
export { ServiceDomainSchema, type ServiceDomain } from './domain/entities/Service.js';
export type { HAConfig, HAIncomingMessage, HAOutgoingCommand } from './domain/entities/HomeAssistantMessage.js';
export type { DiscoverAllOptions, IHomeAssistantDiscovery } from './domain/ports/IHomeAssistantDiscovery.js';
export type { ILogger, LogLevel } from './domain/ports/ILogger.js';
export * from './domain/messaging/topics.js';
export * from './domain/messaging/schemas.js';

export {
  HomeAssistantConnection,
  type HomeAssistantConnectionConfig,
  type HomeAssistantTransports,
} from './infrastructure/discovery/HomeAssistantConnection.js';
export {
  createConnection,
  createLogger,
  discoverAllFromEnvironment,
  type DiscoverFromEnvironmentOptions,
} from './infrastructure/discovery/fromEnvironment.js';
export { RestDiscoveryClient, type FetchFn } from './infrastructure/http/RestDiscoveryClient.js';
export { WebSocketDiscoveryClient, type SocketFactory } from './infrastructure/websocket/WebSocketDiscoveryClient.js';
export type { DiscoverySocket } from './infrastructure/websocket/SocketChannel.js';
export { loadDiscoveryConfig, type DiscoveryConfig } from './infrastructure/config/Config.js';
export { PinoLogger } from './infrastructure/logging/PinoLogger.js';
export { SensorTelemetryMapper } from './infrastructure/mappers/SensorTelemetryMapper.js';
export { normalizeBaseUrl, buildWebSocketUrl, DEFAULT_WEBSOCKET_PATH } from './infrastructure/utils/url.js';
export {
  DiscoverHomeAssistant,
  type DiscoverHomeAssistantInput,
  type DiscoverHomeAssistantOutput,
} from './application/use-cases/DiscoverHomeAssistant.js';
