import { describe, it, expect } from 'vitest';
import {
  ACK_GENERIC,
  ADDON_HA_CMD,
  BROADCAST_CMD,
  CMD_GENERIC,
  STATUS_OFFLINE,
  TELEMETRY_SENSORS,
  TELEMETRY_SYSTEM,
  buildTopic,
} from './topics.js';
import { ValidationError } from '../errors/DiscoveryError.js';

describe('buildTopic', () => {
  it('should render hub-scoped telemetry topics', () => {
    expect(buildTopic(TELEMETRY_SYSTEM, { hub_id: 'hub123', version: 1 })).toBe('hubs/hub123/v1/telemetry/system');
    expect(buildTopic(TELEMETRY_SENSORS, { hub_id: 'hub123', version: 2 })).toBe('hubs/hub123/v2/telemetry/sensors');
  });

  it('should render the status topic used as last will', () => {
    expect(buildTopic(STATUS_OFFLINE, { hub_id: 'hub-7', version: 1 })).toBe('hubs/hub-7/v1/status/offline');
  });

  it('should render the generic command template', () => {
    expect(
      buildTopic(CMD_GENERIC, { hub_id: 'hub123', version: 1, domain: 'diagnostics', action: 'run' })
    ).toBe('hubs/hub123/v1/cmd/diagnostics/run');
  });

  it('should render acknowledgements with dotted command names', () => {
    expect(
      buildTopic(ACK_GENERIC, {
        hub_id: 'hub123',
        version: 1,
        command_name: 'config.update',
        command_id: 'abc123',
      })
    ).toBe('hubs/hub123/v1/ack/config.update/abc123');
  });

  it('should render add-on and broadcast commands', () => {
    expect(buildTopic(ADDON_HA_CMD, { hub_id: 'hub123', version: 1, command: 'restart' })).toBe(
      'hubs/hub123/v1/addon/ha/cmd/restart'
    );
    expect(buildTopic(BROADCAST_CMD, { version: 1, command: 'reboot' })).toBe('hubs/broadcast/v1/cmd/reboot');
  });

  it('should ignore extra parameters', () => {
    expect(buildTopic(BROADCAST_CMD, { version: 3, command: 'sync', hub_id: 'unused' })).toBe(
      'hubs/broadcast/v3/cmd/sync'
    );
  });

  it('should reject a missing placeholder', () => {
    expect(() => buildTopic(TELEMETRY_SYSTEM, { hub_id: 'hub123' })).toThrow(ValidationError);
    expect(() => buildTopic(CMD_GENERIC, { hub_id: 'hub123', version: 1, domain: 'x' })).toThrow(
      'Missing topic placeholder "action" for template hubs/{hub_id}/v{version}/cmd/{domain}/{action}'
    );
  });
});
