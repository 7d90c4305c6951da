import { EventEmitter } from 'events';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { WebSocketDiscoveryClient } from './WebSocketDiscoveryClient.js';
import { DiscoveryError } from '../../domain/errors/DiscoveryError.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

type Message = Record<string, unknown>;

interface FakeSocketScript {
  /** Sent by the server right after the socket opens; strings go out verbatim */
  greeting?: Array<Message | string>;
  /** Server replies to each client message */
  respond?: (message: Message) => Message[];
  open?: boolean;
}

/**
 * In-process stand-in for a Home Assistant websocket endpoint
 */
class FakeSocket extends EventEmitter {
  readonly sent: Message[] = [];
  closed = false;

  constructor(private readonly script: FakeSocketScript = {}) {
    super();
    setImmediate(() => {
      if (script.open === false) return;
      this.emit('open');
      for (const message of script.greeting ?? []) {
        this.deliver(message);
      }
    });
  }

  deliver(message: Message | string): void {
    const raw = typeof message === 'string' ? message : JSON.stringify(message);
    this.emit('message', Buffer.from(raw));
  }

  send(data: string): void {
    const message: Message = JSON.parse(data);
    this.sent.push(message);
    for (const reply of this.script.respond?.(message) ?? []) {
      this.deliver(reply);
    }
  }

  close(): void {
    this.closed = true;
  }
}

const haConfig = { location_name: 'Home', version: '2024.1.0', unit_system: { temperature: '°C' } };

function homeAssistant(overrides: { auth?: Message; result?: (id: unknown) => Message } = {}) {
  return (message: Message): Message[] => {
    if (message.type === 'auth') {
      return [overrides.auth ?? { type: 'auth_ok', ha_version: '2024.1.0' }];
    }
    if (message.type === 'get_config') {
      return [
        overrides.result?.(message.id) ?? { id: message.id, type: 'result', success: true, result: haConfig },
      ];
    }
    return [];
  };
}

async function captureDiscoveryError(promise: Promise<unknown>): Promise<DiscoveryError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof DiscoveryError) return error;
    throw error;
  }
  throw new Error('Expected a DiscoveryError');
}

describe('WebSocketDiscoveryClient', () => {
  let mockLogger: ILogger;

  beforeEach(() => {
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
  });

  function createClient(socket: FakeSocket, options: { token?: string | null; timeout?: number } = {}) {
    const socketFactory = vi.fn((_url: string, _options: { handshakeTimeout: number }) => socket);
    const client = new WebSocketDiscoveryClient(
      {
        url: 'wss://example.com/api/websocket',
        token: options.token === undefined ? 'test-token' : options.token,
        timeout: options.timeout ?? 1000,
        socketFactory,
      },
      mockLogger
    );
    return { client, socketFactory };
  }

  it('should authenticate and return the config from get_config', async () => {
    const socket = new FakeSocket({
      greeting: [{ type: 'auth_required', ha_version: '2024.1.0' }],
      respond: homeAssistant(),
    });
    const { client, socketFactory } = createClient(socket);

    const result = await client.discover();

    expect(result).toEqual({ url: 'wss://example.com/api/websocket', config: haConfig });
    expect(socketFactory).toHaveBeenCalledWith('wss://example.com/api/websocket', { handshakeTimeout: 1000 });
    expect(socket.sent[0]).toEqual({ type: 'auth', access_token: 'test-token' });
    expect(socket.sent[1].type).toBe('get_config');
    expect(socket.sent[1].id).toMatch(/^[0-9a-f]{32}$/);
    expect(socket.closed).toBe(true);
  });

  it('should use a fresh request id for every discovery', async () => {
    const first = new FakeSocket({ greeting: [{ type: 'auth_ok' }], respond: homeAssistant() });
    const second = new FakeSocket({ greeting: [{ type: 'auth_ok' }], respond: homeAssistant() });

    await createClient(first).client.discover();
    await createClient(second).client.discover();

    expect(first.sent[0].id).not.toBe(second.sent[0].id);
  });

  it('should skip authentication when the server sends auth_ok first', async () => {
    const socket = new FakeSocket({ greeting: [{ type: 'auth_ok' }], respond: homeAssistant() });
    const { client } = createClient(socket);

    const result = await client.discover();

    expect(result.config).toEqual(haConfig);
    expect(socket.sent).toHaveLength(1);
    expect(socket.sent[0].type).toBe('get_config');
  });

  it('should reject an invalid token without further exchange', async () => {
    const socket = new FakeSocket({
      greeting: [{ type: 'auth_required' }],
      respond: homeAssistant({ auth: { type: 'auth_invalid', message: 'Invalid access token' } }),
    });
    const { client } = createClient(socket);

    const error = await captureDiscoveryError(client.discover());

    expect(error.message).toBe(
      'Home Assistant rejected the websocket token: {"type":"auth_invalid","message":"Invalid access token"}'
    );
    expect(error.payload).toBe('{"type":"auth_invalid","message":"Invalid access token"}');
    expect(socket.sent).toEqual([{ type: 'auth', access_token: 'test-token' }]);
    expect(socket.closed).toBe(true);
  });

  it('should reject an unexpected first message', async () => {
    const socket = new FakeSocket({ greeting: [{ type: 'event', id: 1 }], respond: homeAssistant() });
    const { client } = createClient(socket);

    await expect(client.discover()).rejects.toThrow(
      'Unexpected websocket handshake response: {"type":"event","id":1}'
    );
    expect(socket.sent).toHaveLength(0);
  });

  it('should fail before opening a socket when no token is configured', async () => {
    const socket = new FakeSocket();
    const { client, socketFactory } = createClient(socket, { token: null });

    await expect(client.discover()).rejects.toThrow('WebSocket discovery requires a long-lived access token');
    expect(socketFactory).not.toHaveBeenCalled();
  });

  it('should reject a get_config reply with another id', async () => {
    const socket = new FakeSocket({
      greeting: [{ type: 'auth_ok' }],
      respond: homeAssistant({ result: () => ({ id: 'someone-else', type: 'result', success: true, result: {} }) }),
    });
    const { client } = createClient(socket);

    await expect(client.discover()).rejects.toThrow('WebSocket get_config response id mismatch');
  });

  it('should reject an unsuccessful get_config reply', async () => {
    const socket = new FakeSocket({
      greeting: [{ type: 'auth_ok' }],
      respond: homeAssistant({
        result: (id) => ({ id, type: 'result', success: false, error: { code: 'unknown_error' } }),
      }),
    });
    const { client } = createClient(socket);

    await expect(client.discover()).rejects.toThrow(/^get_config failed: /);
  });

  it('should reject a get_config result that is not an object', async () => {
    const socket = new FakeSocket({
      greeting: [{ type: 'auth_ok' }],
      respond: homeAssistant({ result: (id) => ({ id, type: 'result', success: true, result: ['a'] }) }),
    });
    const { client } = createClient(socket);

    await expect(client.discover()).rejects.toThrow('get_config returned unexpected payload');
  });

  it('should read a missing get_config result as an empty config', async () => {
    const socket = new FakeSocket({
      greeting: [{ type: 'auth_ok' }],
      respond: homeAssistant({ result: (id) => ({ id, type: 'result', success: true }) }),
    });
    const { client } = createClient(socket);

    const result = await client.discover();

    expect(result.config).toEqual({});
  });

  it('should raise DiscoveryError when a message is not JSON', async () => {
    const socket = new FakeSocket({ greeting: ['not json'] });
    const { client } = createClient(socket);

    const error = await captureDiscoveryError(client.discover());

    expect(error.message).toBe('Failed to decode websocket message');
    expect(error.payload).toBe('not json');
  });

  it('should raise DiscoveryError when a receive exceeds the timeout', async () => {
    const socket = new FakeSocket({ greeting: [{ type: 'auth_required' }] });
    const { client } = createClient(socket, { timeout: 20 });

    await expect(client.discover()).rejects.toThrow(
      'Timed out after 20ms waiting for a websocket message on wss://example.com/api/websocket'
    );
    expect(socket.closed).toBe(true);
  });

  it('should wrap transport errors', async () => {
    const socket = new FakeSocket({ open: false });
    const { client } = createClient(socket);
    const cause = new Error('connect ECONNREFUSED');
    setImmediate(() => socket.emit('error', cause));

    const error = await captureDiscoveryError(client.discover());

    expect(error.message).toBe('WebSocket discovery failed for wss://example.com/api/websocket');
    expect(error.cause).toBe(cause);
    expect(socket.closed).toBe(true);
  });

  it('should wrap a connection closed by the server', async () => {
    const socket = new FakeSocket({ greeting: [{ type: 'auth_required' }] });
    const { client } = createClient(socket);
    socket.send = (data: string) => {
      socket.sent.push(JSON.parse(data));
      socket.emit('close', 1008, Buffer.from('policy violation'));
    };

    const error = await captureDiscoveryError(client.discover());

    expect(error.message).toBe('WebSocket discovery failed for wss://example.com/api/websocket');
    expect(error.cause).toEqual(new Error('WebSocket closed with code 1008: policy violation'));
  });

  it('should close the socket and propagate cancellation', async () => {
    const socket = new FakeSocket({ greeting: [{ type: 'auth_required' }] });
    const { client } = createClient(socket);
    const controller = new AbortController();
    const cancelled = new Error('cancelled');
    setTimeout(() => controller.abort(cancelled), 5);

    await expect(client.discover(controller.signal)).rejects.toBe(cancelled);
    expect(socket.closed).toBe(true);
  });
});
