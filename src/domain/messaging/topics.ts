import { ValidationError } from '../errors/DiscoveryError.js';

/**
 * MQTT topic templates shared by the vault (central server), hubs (remote
 * devices) and the Home Assistant add-on running on each hub.
 *
 * Hub-scoped topics follow `hubs/{hub_id}/v{version}/...`.
 *
 * Placeholders:
 *   hub_id        unique hub identifier
 *   version       protocol/software version
 *   domain        command domain (sensors, config, firmware, tunnel, ...)
 *   action        action within a command domain
 *   command       add-on or broadcast command name
 *   command_name  logical command name used in acknowledgements
 *   command_id    identifier of one command instance
 */

// Telemetry (hub -> vault)

/** CPU, RAM, uptime and similar host metrics */
export const TELEMETRY_SYSTEM = 'hubs/{hub_id}/v{version}/telemetry/system';
/** Sensor states from Home Assistant: basic list, full metadata and deltas */
export const TELEMETRY_SENSORS = 'hubs/{hub_id}/v{version}/telemetry/sensors';
/** Discrete events (door, motion, automations) */
export const TELEMETRY_EVENTS = 'hubs/{hub_id}/v{version}/telemetry/events';
export const TELEMETRY_GENERAL = 'hubs/{hub_id}/v{version}/telemetry/general';

// Presence (hub -> vault)

/** Heartbeat, published on startup and periodically */
export const STATUS_ONLINE = 'hubs/{hub_id}/v{version}/status/online';
/** Configured as the MQTT last will */
export const STATUS_OFFLINE = 'hubs/{hub_id}/v{version}/status/offline';

// Commands (vault -> hub)

export const CMD_CONFIG_UPDATE = 'hubs/{hub_id}/v{version}/cmd/config/update';
export const CMD_FIRMWARE_UPDATE = 'hubs/{hub_id}/v{version}/cmd/firmware/update';
export const CMD_TUNNEL_START = 'hubs/{hub_id}/v{version}/cmd/tunnel/start';
export const CMD_TUNNEL_STOP = 'hubs/{hub_id}/v{version}/cmd/tunnel/stop';
/** Request full metadata for one sensor */
export const CMD_SENSORS_POLL = 'hubs/{hub_id}/v{version}/cmd/sensors/poll';
export const CMD_SENSORS_SET = 'hubs/{hub_id}/v{version}/cmd/sensors/set';
export const CMD_GENERIC = 'hubs/{hub_id}/v{version}/cmd/{domain}/{action}';

// Acknowledgements (hub -> vault), e.g. hubs/hub-1/v1/ack/config.update/abc123

export const ACK_GENERIC = 'hubs/{hub_id}/v{version}/ack/{command_name}/{command_id}';

// Home Assistant add-on namespace

export const ADDON_HA_TELEMETRY = 'hubs/{hub_id}/v{version}/addon/ha/telemetry';
export const ADDON_HA_STATUS = 'hubs/{hub_id}/v{version}/addon/ha/status';
export const ADDON_HA_CMD = 'hubs/{hub_id}/v{version}/addon/ha/cmd/{command}';

// Broadcast (vault -> all hubs)

export const BROADCAST_CMD = 'hubs/broadcast/v{version}/cmd/{command}';

export type TopicParams = Record<string, string | number>;

const PLACEHOLDER = /\{([a-z_]+)\}/g;

/**
 * Render a topic template.
 *
 * @example
 * buildTopic(TELEMETRY_SYSTEM, { hub_id: 'hub123', version: 1 })
 * // => 'hubs/hub123/v1/telemetry/system'
 */
export function buildTopic(template: string, params: TopicParams): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new ValidationError(`Missing topic placeholder "${name}" for template ${template}`);
    }
    return String(value);
  });
}
