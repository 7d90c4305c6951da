import WebSocket from 'ws';
import { randomUUID } from 'crypto';
import { DiscoveryError } from '../../domain/errors/DiscoveryError.js';
import {
  HAIncomingMessageSchema,
  type HAConfig,
  type HAIncomingMessage,
  type HAOutgoingCommand,
} from '../../domain/entities/HomeAssistantMessage.js';
import type { WebsocketDiscoveryResult } from '../../domain/entities/Discovery.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { SocketChannel, type DiscoverySocket } from './SocketChannel.js';

export type SocketFactory = (url: string, options: { handshakeTimeout: number }) => DiscoverySocket;

export interface WebSocketDiscoveryClientConfig {
  url: string;
  token?: string | null;
  /** Bound for opening the socket and for each receive, in ms */
  timeout: number;
  socketFactory?: SocketFactory;
}

// ws sends no pings unless asked to, so keepalive stays off
const defaultSocketFactory: SocketFactory = (url, options) => new WebSocket(url, options);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One-shot Home Assistant WebSocket exchange: authenticate, then `get_config`
 */
export class WebSocketDiscoveryClient {
  private readonly socketFactory: SocketFactory;

  constructor(
    private readonly config: WebSocketDiscoveryClientConfig,
    private readonly logger: ILogger
  ) {
    this.socketFactory = config.socketFactory ?? defaultSocketFactory;
  }

  ensureToken(): string {
    if (!this.config.token) {
      throw new DiscoveryError('WebSocket discovery requires a long-lived access token', {
        url: this.config.url,
      });
    }
    return this.config.token;
  }

  async discover(signal?: AbortSignal): Promise<WebsocketDiscoveryResult> {
    const token = this.ensureToken();
    signal?.throwIfAborted();

    const { url, timeout } = this.config;
    let channel: SocketChannel | null = null;

    try {
      this.logger.debug('Opening discovery websocket', { url });
      channel = new SocketChannel(this.socketFactory(url, { handshakeTimeout: timeout }), url, signal);
      await channel.waitOpen(timeout);

      await this.performHandshake(channel, token);
      const config = await this.fetchConfig(channel);

      this.logger.debug('WebSocket discovery completed', {
        url,
        haVersion: typeof config.version === 'string' ? config.version : undefined,
      });
      return { url, config };
    } catch (error) {
      signal?.throwIfAborted();
      if (error instanceof DiscoveryError) {
        throw error;
      }
      throw new DiscoveryError(`WebSocket discovery failed for ${url}`, { url, cause: error });
    } finally {
      channel?.close();
    }
  }

  private async performHandshake(channel: SocketChannel, token: string): Promise<void> {
    const first = await this.receiveJson(channel);

    if (first.type === 'auth_required') {
      this.logger.debug('Authentication required', { haVersion: first.ha_version });
      this.sendCommand(channel, { type: 'auth', access_token: token });

      const authResult = await this.receiveJson(channel);
      if (authResult.type !== 'auth_ok') {
        const payload = JSON.stringify(authResult);
        throw new DiscoveryError(`Home Assistant rejected the websocket token: ${payload}`, {
          url: this.config.url,
          payload,
        });
      }
      this.logger.debug('Authentication successful', { haVersion: authResult.ha_version });
      return;
    }

    if (first.type !== 'auth_ok') {
      const payload = JSON.stringify(first);
      throw new DiscoveryError(`Unexpected websocket handshake response: ${payload}`, {
        url: this.config.url,
        payload,
      });
    }
  }

  private async fetchConfig(channel: SocketChannel): Promise<HAConfig> {
    const requestId = randomUUID().replace(/-/g, '');
    this.sendCommand(channel, { id: requestId, type: 'get_config' });

    const response = await this.receiveJson(channel);
    const payload = JSON.stringify(response);

    if (response.id !== requestId) {
      throw new DiscoveryError('WebSocket get_config response id mismatch', {
        url: this.config.url,
        payload,
      });
    }
    if (response.type !== 'result' || response.success !== true) {
      throw new DiscoveryError(`get_config failed: ${payload}`, { url: this.config.url, payload });
    }

    // An absent result is read as an empty config
    if (response.result === undefined) {
      return {};
    }
    if (!isPlainObject(response.result)) {
      throw new DiscoveryError('get_config returned unexpected payload', { url: this.config.url, payload });
    }
    return response.result;
  }

  private sendCommand(channel: SocketChannel, command: HAOutgoingCommand): void {
    channel.send(command);
    this.logger.trace('Command sent', { type: command.type });
  }

  private async receiveJson(channel: SocketChannel): Promise<HAIncomingMessage> {
    const raw = await channel.receive(this.config.timeout);

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      throw new DiscoveryError('Failed to decode websocket message', {
        url: this.config.url,
        payload: raw,
        cause: error,
      });
    }

    const parsed = HAIncomingMessageSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new DiscoveryError('Unexpected websocket message shape', {
        url: this.config.url,
        payload: raw,
        cause: parsed.error,
      });
    }

    this.logger.trace('Received message', { type: parsed.data.type });
    return parsed.data;
  }
}
