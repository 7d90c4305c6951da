import type { IHomeAssistantDiscovery } from '../../domain/ports/IHomeAssistantDiscovery.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { DiscoveryResult } from '../../domain/entities/Discovery.js';
import type { SensorsTelemetry } from '../../domain/messaging/schemas.js';
import { SensorTelemetryMapper } from '../../infrastructure/mappers/SensorTelemetryMapper.js';

export interface DiscoverHomeAssistantInput {
  forceRefresh?: boolean;
  /** Also build a sensors telemetry payload from the discovered states */
  includeTelemetry?: boolean;
  /** Full metadata instead of the basic list when building telemetry */
  fullTelemetry?: boolean;
  /** Restrict telemetry to these entity domains */
  telemetryDomains?: string[];
  signal?: AbortSignal;
}

export interface DiscoverHomeAssistantOutput {
  result: DiscoveryResult;
  serviceDomainCount: number;
  entityCount: number;
  haVersion: string | null;
  locationName: string | null;
  telemetry?: SensorsTelemetry;
}

function readString(config: Readonly<Record<string, unknown>>, key: string): string | null {
  const value = config[key];
  return typeof value === 'string' ? value : null;
}

/**
 * Use case for a single discovery pass against Home Assistant
 */
export class DiscoverHomeAssistant {
  constructor(
    private readonly discovery: IHomeAssistantDiscovery,
    private readonly logger: ILogger
  ) {}

  async execute(input: DiscoverHomeAssistantInput = {}): Promise<DiscoverHomeAssistantOutput> {
    this.logger.info('Executing DiscoverHomeAssistant use case');

    try {
      const result = await this.discovery.discoverAll({
        forceRefresh: input.forceRefresh,
        signal: input.signal,
      });
      const { config } = result.websocket;

      const output: DiscoverHomeAssistantOutput = {
        result,
        serviceDomainCount: result.rest.services.length,
        entityCount: result.rest.states.length,
        haVersion: readString(config, 'version'),
        locationName: readString(config, 'location_name'),
      };

      if (input.includeTelemetry) {
        output.telemetry = SensorTelemetryMapper.toSensorsTelemetry(result.rest.states, {
          partial: !input.fullTelemetry,
          domains: input.telemetryDomains,
        });
        this.logger.debug('Built sensors telemetry', { sensors: output.telemetry.sensors.length });
      }

      this.logger.info('Home Assistant discovered', {
        haVersion: output.haVersion,
        entityCount: output.entityCount,
        serviceDomainCount: output.serviceDomainCount,
      });
      return output;
    } catch (error) {
      this.logger.error('Failed to discover Home Assistant', error);
      throw error;
    }
  }
}
