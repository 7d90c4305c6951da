import { ValidationError } from '../../domain/errors/DiscoveryError.js';

export const DEFAULT_WEBSOCKET_PATH = 'api/websocket';

const SECURE_SCHEMES = new Set(['https:', 'wss:']);

function stripLeadingSlashes(path: string): string {
  return path.replace(/^\/+/, '');
}

/**
 * Validate a REST base URL and drop its trailing slashes.
 * Throws ValidationError when the value is empty or has no scheme or host.
 */
export function normalizeBaseUrl(raw: string): string {
  const stripped = raw.trim();
  if (!stripped) {
    throw new ValidationError('baseUrl must not be empty');
  }

  let parsed: URL;
  try {
    parsed = new URL(stripped);
  } catch (error) {
    throw new ValidationError('baseUrl must include a scheme and host', {
      url: stripped,
      cause: error,
    });
  }
  if (!parsed.protocol || !parsed.host) {
    throw new ValidationError('baseUrl must include a scheme and host', { url: stripped });
  }

  return stripped.replace(/\/+$/, '');
}

/**
 * Resolve a path against a normalized base URL
 */
export function joinUrl(baseUrl: string, path: string): string {
  return new URL(stripLeadingSlashes(path), `${baseUrl}/`).toString();
}

/**
 * Derive the WebSocket endpoint: `wss` for https/wss bases, `ws` otherwise
 */
export function buildWebSocketUrl(baseUrl: string, path: string = DEFAULT_WEBSOCKET_PATH): string {
  const joined = new URL(stripLeadingSlashes(path) || DEFAULT_WEBSOCKET_PATH, `${baseUrl}/`);
  const scheme = SECURE_SCHEMES.has(joined.protocol) ? 'wss:' : 'ws:';
  // The URL protocol setter ignores switches from non-special schemes, so rebuild the string
  return `${scheme}${joined.href.slice(joined.protocol.length)}`;
}
