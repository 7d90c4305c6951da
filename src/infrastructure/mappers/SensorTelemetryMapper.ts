import { getEntityDomain, type EntityState } from '../../domain/entities/Entity.js';
import type { BasicSensor, FullSensor, SensorsTelemetry } from '../../domain/messaging/schemas.js';

export interface SensorsTelemetryOptions {
  /** Basic list instead of full metadata */
  partial?: boolean;
  /** Unix time in seconds */
  timestamp?: number;
  /** Only keep entities of these domains */
  domains?: string[];
}

function readAttributes(state: EntityState): Record<string, unknown> {
  const { attributes } = state;
  if (typeof attributes !== 'object' || attributes === null || Array.isArray(attributes)) {
    return {};
  }
  return { ...attributes };
}

/**
 * Maps Home Assistant entity states to sensor telemetry payloads
 */
export class SensorTelemetryMapper {
  static toBasicSensor(state: EntityState): BasicSensor {
    return {
      id: state.entity_id,
      state: state.state,
      type: getEntityDomain(state.entity_id),
    };
  }

  static toFullSensor(state: EntityState): FullSensor {
    const attributes = readAttributes(state);
    const unit = attributes.unit_of_measurement;

    return {
      id: state.entity_id,
      state: state.state,
      type: getEntityDomain(state.entity_id),
      unit: typeof unit === 'string' ? unit : null,
      attributes,
    };
  }

  /**
   * Look up one entity for a sensors.poll command
   */
  static findSensor(states: readonly EntityState[], entityId: string): FullSensor | null {
    const state = states.find((s) => s.entity_id === entityId);
    return state ? SensorTelemetryMapper.toFullSensor(state) : null;
  }

  static toSensorsTelemetry(
    states: readonly EntityState[],
    options: SensorsTelemetryOptions = {}
  ): SensorsTelemetry {
    const partial = options.partial ?? true;
    const domains = options.domains ? new Set(options.domains) : null;
    const selected = domains
      ? states.filter((s) => domains.has(getEntityDomain(s.entity_id)))
      : states;

    return {
      partial,
      timestamp: options.timestamp ?? Date.now() / 1000,
      sensors: selected.map((s) =>
        partial ? SensorTelemetryMapper.toBasicSensor(s) : SensorTelemetryMapper.toFullSensor(s)
      ),
    };
  }
}
