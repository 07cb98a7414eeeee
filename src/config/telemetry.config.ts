import { ConfigService } from '@nestjs/config';

export const TELEMETRY_CONFIG = 'TELEMETRY_CONFIG';

export interface TelemetryConfig {
  maxBatchSize: number;
  maxQueryPoints: number;
  aggregationFetchLimit: number;
  maxReportedErrors: number;
  enforceAlertCooldown: boolean;
  autoResolveBatchSize: number;
  eventSource: string;
  inboundEventChannels: string[];
  eventDedupTtlSeconds: number;
  defaultRealtimeMaxFrequencyMs: number;
}

function intSetting(configService: ConfigService, key: string, fallback: number): number {
  const parsed = parseInt(configService.get<string>(key) || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const getTelemetryConfig = (configService: ConfigService): TelemetryConfig => {
  const channels = configService.get<string>('TELEMETRY_INBOUND_CHANNELS') || 'device_service.device.deleted';

  return {
    maxBatchSize: intSetting(configService, 'TELEMETRY_MAX_BATCH_SIZE', 1000),
    maxQueryPoints: intSetting(configService, 'TELEMETRY_MAX_QUERY_POINTS', 10000),
    aggregationFetchLimit: intSetting(configService, 'TELEMETRY_AGGREGATION_FETCH_LIMIT', 50000),
    maxReportedErrors: intSetting(configService, 'TELEMETRY_MAX_REPORTED_ERRORS', 10),
    enforceAlertCooldown: configService.get<string>('ALERT_COOLDOWN_ENFORCED') !== 'false',
    autoResolveBatchSize: intSetting(configService, 'ALERT_AUTO_RESOLVE_BATCH_SIZE', 100),
    eventSource: configService.get<string>('TELEMETRY_EVENT_SOURCE') || 'telemetry_service',
    inboundEventChannels: channels
      .split(',')
      .map(channel => channel.trim())
      .filter(channel => channel.length > 0),
    eventDedupTtlSeconds: intSetting(configService, 'EVENT_DEDUP_TTL_SECONDS', 86400),
    defaultRealtimeMaxFrequencyMs: intSetting(configService, 'REALTIME_MAX_FREQUENCY_MS', 1000),
  };
};
