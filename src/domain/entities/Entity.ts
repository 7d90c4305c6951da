import { z } from 'zod';

/**
 * Entity state as listed by `GET /api/states`.
 * Only `entity_id` and `state` are checked; `attributes`, `context` and the
 * timestamps are kept exactly as Home Assistant sent them.
 */
export const EntityStateSchema = z
  .object({
    entity_id: z.string(),
    state: z.string(),
    attributes: z.unknown().optional(),
  })
  .passthrough();

export type EntityState = z.infer<typeof EntityStateSchema>;

/**
 * Represents the domain of an entity (light, switch, sensor, etc.)
 */
export type EntityDomain =
  | 'light'
  | 'switch'
  | 'sensor'
  | 'binary_sensor'
  | 'climate'
  | 'cover'
  | 'fan'
  | 'media_player'
  | 'automation'
  | 'script'
  | 'scene'
  | 'person'
  | 'device_tracker'
  | string;

/**
 * Extracts the domain from an entity_id
 */
export function getEntityDomain(entityId: string): EntityDomain {
  const [domain] = entityId.split('.');
  return domain ?? entityId;
}
