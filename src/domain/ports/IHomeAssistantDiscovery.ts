import type {
  DiscoveryResult,
  RESTDiscoveryResult,
  WebsocketDiscoveryResult,
} from '../entities/Discovery.js';

export interface DiscoverAllOptions {
  /** Ignore the cached result and query Home Assistant again */
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

/**
 * Port interface for discovering one Home Assistant instance
 */
export interface IHomeAssistantDiscovery {
  /**
   * Normalized REST base URL (scheme and host, no trailing slash)
   */
  readonly restBaseUrl: string;

  /**
   * WebSocket URL derived from the REST base URL
   */
  readonly webSocketUrl: string;

  /**
   * Fetch services and states over REST
   */
  discoverRest(signal?: AbortSignal): Promise<RESTDiscoveryResult>;

  /**
   * Authenticate over WebSocket and fetch the instance config
   */
  discoverWebSocket(signal?: AbortSignal): Promise<WebsocketDiscoveryResult>;

  /**
   * Run REST then WebSocket discovery, caching the combined result
   */
  discoverAll(options?: DiscoverAllOptions): Promise<DiscoveryResult>;
}
