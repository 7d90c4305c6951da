import type {
  DiscoveryResult,
  RESTDiscoveryResult,
  WebsocketDiscoveryResult,
} from '../../domain/entities/Discovery.js';
import type { DiscoverAllOptions, IHomeAssistantDiscovery } from '../../domain/ports/IHomeAssistantDiscovery.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RestDiscoveryClient, type FetchFn } from '../http/RestDiscoveryClient.js';
import { WebSocketDiscoveryClient, type SocketFactory } from '../websocket/WebSocketDiscoveryClient.js';
import { AsyncLock } from '../utils/AsyncLock.js';
import { DEFAULT_WEBSOCKET_PATH, buildWebSocketUrl, normalizeBaseUrl } from '../utils/url.js';

export interface HomeAssistantConnectionConfig {
  baseUrl: string;
  /** Long-lived access token; REST works without it, WebSocket does not */
  token?: string | null;
  webSocketPath?: string;
  timeout?: number;
}

/**
 * Transport seams, mainly for tests
 */
export interface HomeAssistantTransports {
  fetchFn?: FetchFn;
  socketFactory?: SocketFactory;
}

/**
 * Discovery helper for one Home Assistant instance.
 *
 * URLs are validated once at construction. `discoverAll` runs REST then
 * WebSocket discovery under a per-connection lock and caches the combined
 * result, so concurrent callers share a single round-trip.
 */
export class HomeAssistantConnection implements IHomeAssistantDiscovery {
  readonly restBaseUrl: string;
  readonly webSocketUrl: string;

  private readonly rest: RestDiscoveryClient;
  private readonly webSocket: WebSocketDiscoveryClient;
  private readonly discoveryLock = new AsyncLock();
  private discoveryCache: DiscoveryResult | null = null;

  constructor(
    config: HomeAssistantConnectionConfig,
    private readonly logger: ILogger,
    transports: HomeAssistantTransports = {}
  ) {
    const timeout = config.timeout ?? 30000;
    this.restBaseUrl = normalizeBaseUrl(config.baseUrl);
    this.webSocketUrl = buildWebSocketUrl(this.restBaseUrl, config.webSocketPath ?? DEFAULT_WEBSOCKET_PATH);

    this.rest = new RestDiscoveryClient(
      { baseUrl: this.restBaseUrl, token: config.token, timeout, fetchFn: transports.fetchFn },
      logger.child({ component: 'RestDiscoveryClient' })
    );
    this.webSocket = new WebSocketDiscoveryClient(
      { url: this.webSocketUrl, token: config.token, timeout, socketFactory: transports.socketFactory },
      logger.child({ component: 'WebSocketDiscoveryClient' })
    );
  }

  get cachedResult(): DiscoveryResult | null {
    return this.discoveryCache;
  }

  async discoverRest(signal?: AbortSignal): Promise<RESTDiscoveryResult> {
    return this.rest.discover(signal);
  }

  async discoverWebSocket(signal?: AbortSignal): Promise<WebsocketDiscoveryResult> {
    return this.webSocket.discover(signal);
  }

  async discoverAll(options: DiscoverAllOptions = {}): Promise<DiscoveryResult> {
    const { forceRefresh = false, signal } = options;

    return this.discoveryLock.runExclusive(async () => {
      signal?.throwIfAborted();
      if (this.discoveryCache && !forceRefresh) {
        this.logger.debug('Returning cached discovery result', { url: this.restBaseUrl });
        return this.discoveryCache;
      }

      this.logger.info('Discovering Home Assistant', {
        url: this.restBaseUrl,
        forceRefresh,
      });

      try {
        const rest = await this.discoverRest(signal);
        const websocket = await this.discoverWebSocket(signal);
        const result: DiscoveryResult = { rest, websocket };
        this.discoveryCache = result;

        this.logger.info('Discovery completed', {
          url: this.restBaseUrl,
          services: rest.services.length,
          states: rest.states.length,
        });
        return result;
      } catch (error) {
        this.logger.error('Discovery failed', error, { url: this.restBaseUrl });
        throw error;
      }
    }, signal);
  }
}
