/**
 * Payload schemas exchanged between vault and hubs over the topics in
 * `topics.ts`. Schemas are the source of truth; types are derived with z.infer.
 */
import { z } from 'zod';

// =============================================================================
// Enums
// =============================================================================

export const AckStatusSchema = z.enum(['success', 'error']);
export type AckStatus = z.infer<typeof AckStatusSchema>;

export const EventTypeSchema = z.enum(['door', 'motion', 'button', 'power', 'other']);
export type EventType = z.infer<typeof EventTypeSchema>;

export const CommandNameSchema = z.enum([
  'config.update',
  'firmware.update',
  'tunnel.start',
  'tunnel.stop',
  'sensors.poll',
  'sensors.set',
  'addon.ha',
]);
export type CommandName = z.infer<typeof CommandNameSchema>;

// =============================================================================
// Sensors
// =============================================================================

/**
 * Minimal sensor, used in the basic discovery list and in delta updates
 */
export const BasicSensorSchema = z.object({
  id: z.string(),
  state: z.unknown().optional(),
  type: z.string().nullable().optional(),
});
export type BasicSensor = z.infer<typeof BasicSensorSchema>;

/**
 * Full sensor metadata, returned on poll or change
 */
export const FullSensorSchema = z.object({
  id: z.string(),
  state: z.unknown(),
  type: z.string().nullable(),
  unit: z.string().nullable().optional(),
  attributes: z.record(z.unknown()),
});
export type FullSensor = z.infer<typeof FullSensorSchema>;

/**
 * Full sensors are tried first; an entry without `attributes` parses as basic.
 * partial = true for basic lists and deltas, false for a full metadata dump
 */
export const SensorsTelemetrySchema = z.object({
  partial: z.boolean(),
  timestamp: z.number(),
  sensors: z.array(z.union([FullSensorSchema, BasicSensorSchema])),
});
export type SensorsTelemetry = z.infer<typeof SensorsTelemetrySchema>;

// =============================================================================
// Telemetry
// =============================================================================

export const SystemTelemetrySchema = z.object({
  cpu: z.number().describe('CPU usage percentage'),
  ram: z.number().describe('RAM usage percentage'),
  uptime: z.number().describe('Uptime in seconds'),
  temperature: z.number().nullable().optional().describe('System temperature'),
});
export type SystemTelemetry = z.infer<typeof SystemTelemetrySchema>;

export const EventTelemetrySchema = z.object({
  event_type: EventTypeSchema,
  timestamp: z.number(),
  details: z.record(z.unknown()).default({}),
});
export type EventTelemetry = z.infer<typeof EventTelemetrySchema>;

export const GeneralTelemetrySchema = z.object({
  data: z.record(z.unknown()).default({}),
});
export type GeneralTelemetry = z.infer<typeof GeneralTelemetrySchema>;

// =============================================================================
// Status
// =============================================================================

export const StatusOnlineSchema = z.object({
  status: z.literal('online').default('online'),
  timestamp: z.number(),
});
export type StatusOnline = z.infer<typeof StatusOnlineSchema>;

export const StatusOfflineSchema = z.object({
  status: z.literal('offline').default('offline'),
  timestamp: z.number(),
});
export type StatusOffline = z.infer<typeof StatusOfflineSchema>;

// =============================================================================
// Commands (vault -> hub)
// =============================================================================

const CommandBaseSchema = z.object({
  command_id: z.string(),
});

export const ConfigUpdateCommandSchema = CommandBaseSchema.extend({
  version: z.number().int(),
  config: z.record(z.unknown()),
});
export type ConfigUpdateCommand = z.infer<typeof ConfigUpdateCommandSchema>;

export const FirmwareUpdateCommandSchema = CommandBaseSchema.extend({
  download_url: z.string(),
  checksum: z.string(),
});
export type FirmwareUpdateCommand = z.infer<typeof FirmwareUpdateCommandSchema>;

export const TunnelStartCommandSchema = CommandBaseSchema.extend({
  metadata: z.record(z.unknown()).default({}),
});
export type TunnelStartCommand = z.infer<typeof TunnelStartCommandSchema>;

export const TunnelStopCommandSchema = CommandBaseSchema.extend({
  metadata: z.record(z.unknown()).default({}),
});
export type TunnelStopCommand = z.infer<typeof TunnelStopCommandSchema>;

/**
 * Full metadata request for one sensor, e.g. entity_id = sensor.kitchen_temp
 */
export const SensorsPollCommandSchema = CommandBaseSchema.extend({
  entity_id: z.string(),
});
export type SensorsPollCommand = z.infer<typeof SensorsPollCommandSchema>;

export const SensorsSetCommandSchema = CommandBaseSchema.extend({
  settings: z.record(z.unknown()).default({}),
});
export type SensorsSetCommand = z.infer<typeof SensorsSetCommandSchema>;

// =============================================================================
// Home Assistant add-on
// =============================================================================

export const HAAddonTelemetrySchema = z.object({
  state: z.record(z.unknown()).default({}),
  timestamp: z.number(),
});
export type HAAddonTelemetry = z.infer<typeof HAAddonTelemetrySchema>;

export const HAAddonStatusSchema = z.object({
  online: z.boolean(),
  version: z.string(),
  timestamp: z.number(),
});
export type HAAddonStatus = z.infer<typeof HAAddonStatusSchema>;

export const HAAddonCommandSchema = CommandBaseSchema.extend({
  action: z.string(),
  data: z.record(z.unknown()).default({}),
});
export type HAAddonCommand = z.infer<typeof HAAddonCommandSchema>;

// =============================================================================
// Acknowledgements (hub -> vault)
// =============================================================================

export const CommandAckSchema = z.object({
  command_id: z.string(),
  status: AckStatusSchema,
  message: z.string().nullable().optional(),
  timestamp: z.number(),
});
export type CommandAck = z.infer<typeof CommandAckSchema>;

// =============================================================================
// Unions
// =============================================================================

export const TelemetryPayloadSchema = z.union([
  SensorsTelemetrySchema,
  SystemTelemetrySchema,
  EventTelemetrySchema,
  GeneralTelemetrySchema,
  HAAddonTelemetrySchema,
]);
export type TelemetryPayload = z.infer<typeof TelemetryPayloadSchema>;

export const StatusPayloadSchema = z.union([StatusOnlineSchema, StatusOfflineSchema]);
export type StatusPayload = z.infer<typeof StatusPayloadSchema>;

export const CommandPayloadSchema = z.union([
  ConfigUpdateCommandSchema,
  FirmwareUpdateCommandSchema,
  TunnelStartCommandSchema,
  TunnelStopCommandSchema,
  SensorsPollCommandSchema,
  SensorsSetCommandSchema,
  HAAddonCommandSchema,
]);
export type CommandPayload = z.infer<typeof CommandPayloadSchema>;

export const AckPayloadSchema = CommandAckSchema;
export type AckPayload = CommandAck;

/**
 * Any payload, for routers that inspect messages before dispatching
 */
export const PayloadSchema = z.union([
  TelemetryPayloadSchema,
  StatusPayloadSchema,
  CommandPayloadSchema,
  AckPayloadSchema,
]);
export type Payload = z.infer<typeof PayloadSchema>;

/**
 * Command payload schema for each command name
 */
export const COMMAND_SCHEMAS = {
  'config.update': ConfigUpdateCommandSchema,
  'firmware.update': FirmwareUpdateCommandSchema,
  'tunnel.start': TunnelStartCommandSchema,
  'tunnel.stop': TunnelStopCommandSchema,
  'sensors.poll': SensorsPollCommandSchema,
  'sensors.set': SensorsSetCommandSchema,
  'addon.ha': HAAddonCommandSchema,
} as const satisfies Record<CommandName, z.ZodTypeAny>;

/**
 * Validate a command payload against the schema registered for its name
 */
export function parseCommand(name: CommandName, payload: unknown): CommandPayload {
  return COMMAND_SCHEMAS[name].parse(payload);
}
