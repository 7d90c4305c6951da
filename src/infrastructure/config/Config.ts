import dotenv from "dotenv";
import { DiscoveryError } from "../../domain/errors/DiscoveryError.js";
import { LOG_LEVELS, type LogLevel } from "../../domain/ports/ILogger.js";
import { DEFAULT_WEBSOCKET_PATH } from "../utils/url.js";

// Load environment variables (for standalone mode)
dotenv.config();

export type Env = Record<string, string | undefined>;

export const DEFAULT_TIMEOUT_MS = 30000;

/** Supervisor proxy endpoints seen from inside an add-on container */
export const SUPERVISOR_REST_URL = "http://supervisor/core";
export const SUPERVISOR_WEBSOCKET_PATH = "websocket";

export interface DiscoveryConfig {
  homeAssistant: {
    restUrl: string;
    token?: string;
    webSocketPath: string;
    timeout: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  isAddon: boolean;
}

/**
 * Add-ons get their token injected by the Supervisor
 */
function isHomeAssistantAddon(env: Env): boolean {
  return !!env.SUPERVISOR_TOKEN;
}

function getEnvOrThrow(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new DiscoveryError(`Environment variable ${key} is required for discovery.`);
  }
  return value;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

function getLogLevel(env: Env): LogLevel {
  const value = env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

/**
 * Load configuration - supports both add-on and standalone modes
 *
 * Standalone: HA_REST_URL is required, HA_TOKEN optional (REST discovery works without it).
 * Add-on: falls back to the Supervisor proxy and SUPERVISOR_TOKEN.
 */
export function loadDiscoveryConfig(env: Env = process.env): DiscoveryConfig {
  const isAddon = isHomeAssistantAddon(env);

  if (isAddon) {
    return {
      homeAssistant: {
        restUrl: getEnvOrDefault(env, "HA_REST_URL", SUPERVISOR_REST_URL),
        token: env.HA_TOKEN || env.SUPERVISOR_TOKEN,
        webSocketPath: getEnvOrDefault(env, "HA_WS_PATH", SUPERVISOR_WEBSOCKET_PATH),
        timeout: getEnvNumber(env, "HA_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
      },
      logging: {
        level: getLogLevel(env),
        pretty: false, // Structured logging for add-on
      },
      isAddon: true,
    };
  }

  return {
    homeAssistant: {
      restUrl: getEnvOrThrow(env, "HA_REST_URL"),
      token: env.HA_TOKEN || undefined,
      webSocketPath: getEnvOrDefault(env, "HA_WS_PATH", DEFAULT_WEBSOCKET_PATH),
      timeout: getEnvNumber(env, "HA_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    },
    logging: {
      level: getLogLevel(env),
      pretty: env.NODE_ENV !== "production",
    },
    isAddon: false,
  };
}
