import type { DiscoveryResult } from '../../domain/entities/Discovery.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { loadDiscoveryConfig, type DiscoveryConfig, type Env } from '../config/Config.js';
import { PinoLogger } from '../logging/PinoLogger.js';
import { HomeAssistantConnection, type HomeAssistantTransports } from './HomeAssistantConnection.js';

export interface DiscoverFromEnvironmentOptions {
  forceRefresh?: boolean;
  env?: Env;
  logger?: ILogger;
  transports?: HomeAssistantTransports;
}

export function createLogger(config: DiscoveryConfig): ILogger {
  return new PinoLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
  });
}

export function createConnection(
  config: DiscoveryConfig,
  logger: ILogger,
  transports: HomeAssistantTransports = {}
): HomeAssistantConnection {
  return new HomeAssistantConnection(
    {
      baseUrl: config.homeAssistant.restUrl,
      token: config.homeAssistant.token,
      webSocketPath: config.homeAssistant.webSocketPath,
      timeout: config.homeAssistant.timeout,
    },
    logger.child({ component: 'HomeAssistantConnection' }),
    transports
  );
}

/**
 * Discover REST and WebSocket metadata using HA_REST_URL / HA_TOKEN
 */
export async function discoverAllFromEnvironment(
  options: DiscoverFromEnvironmentOptions = {}
): Promise<DiscoveryResult> {
  const config = loadDiscoveryConfig(options.env);
  const logger = options.logger ?? createLogger(config);
  const connection = createConnection(config, logger, options.transports);
  return connection.discoverAll({ forceRefresh: options.forceRefresh });
}
