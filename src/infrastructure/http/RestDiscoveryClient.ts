import { z } from 'zod';
import { DiscoveryError } from '../../domain/errors/DiscoveryError.js';
import { EntityStateSchema } from '../../domain/entities/Entity.js';
import { ServiceDomainSchema } from '../../domain/entities/Service.js';
import type { RESTDiscoveryResult } from '../../domain/entities/Discovery.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { joinUrl } from '../utils/url.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface RestDiscoveryClientConfig {
  /** Normalized base URL, without trailing slash */
  baseUrl: string;
  token?: string | null;
  /** Per-request budget in ms, covering headers and body */
  timeout: number;
  fetchFn?: FetchFn;
}

const SERVICES_PATH = 'api/services';
const STATES_PATH = 'api/states';

/**
 * Reads the service and state listings of a Home Assistant instance
 */
export class RestDiscoveryClient {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly config: RestDiscoveryClientConfig,
    private readonly logger: ILogger
  ) {
    this.fetchFn = config.fetchFn ?? fetch;
  }

  buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }
    return headers;
  }

  makeUrl(path: string): string {
    return joinUrl(this.config.baseUrl, path);
  }

  /**
   * Services first, then states. Never concurrent.
   */
  async discover(signal?: AbortSignal): Promise<RESTDiscoveryResult> {
    const headers = this.buildHeaders();
    const services = await this.fetchList(SERVICES_PATH, z.array(ServiceDomainSchema), headers, signal);
    const states = await this.fetchList(STATES_PATH, z.array(EntityStateSchema), headers, signal);

    this.logger.debug('REST discovery completed', {
      baseUrl: this.config.baseUrl,
      services: services.length,
      states: states.length,
    });

    return { baseUrl: this.config.baseUrl, services, states };
  }

  private async fetchList<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<z.infer<T>> {
    const url = this.makeUrl(path);
    const body = await this.fetchJson(url, headers, signal);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new DiscoveryError(`Unexpected payload from ${url}: ${parsed.error.message}`, {
        url,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private async fetchJson(
    url: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<unknown> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.debug('GET', { url });

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
      });
      const content = await response.text();

      if (response.status !== 200) {
        throw new DiscoveryError(`REST endpoint ${url} returned ${response.status}: ${content}`, {
          url,
          status: response.status,
          payload: content,
        });
      }

      try {
        const parsed: unknown = JSON.parse(content);
        return parsed;
      } catch (error) {
        throw new DiscoveryError(`Unable to decode JSON from ${url}`, { url, payload: content, cause: error });
      }
    } catch (error) {
      if (error instanceof DiscoveryError) {
        throw error;
      }
      signal?.throwIfAborted();
      if (timedOut) {
        throw new DiscoveryError(`Timed out while reading ${url}`, { url, cause: error });
      }
      throw new DiscoveryError(`REST request failed for ${url}`, { url, cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
