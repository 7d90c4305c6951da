import type { EntityState } from './Entity.js';
import type { ServiceDomain } from './Service.js';

/**
 * Snapshot of the REST listings of one Home Assistant instance
 */
export interface RESTDiscoveryResult {
  readonly baseUrl: string;
  readonly services: readonly ServiceDomain[];
  readonly states: readonly EntityState[];
}

/**
 * Outcome of an authenticated WebSocket handshake plus `get_config`
 */
export interface WebsocketDiscoveryResult {
  readonly url: string;
  readonly config: Readonly<Record<string, unknown>>;
}

/**
 * Combined discovery payload, cached per connection and replaced wholesale
 */
export interface DiscoveryResult {
  readonly rest: RESTDiscoveryResult;
  readonly websocket: WebsocketDiscoveryResult;
}
