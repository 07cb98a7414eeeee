import { Inject, Injectable, Logger } from '@nestjs/common';
import { MetricDefinition } from '../../database/entities/metric-definition.entity';
import {
  METRIC_CATALOG,
  MetricCatalog,
  TIME_SERIES_STORE,
  TimeSeriesStore,
} from '../../common/interfaces/telemetry-stores.interface';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import { AlertEvaluatorService } from '../alerts/alert-evaluator.service';
import { RealtimeFanoutService } from '../realtime/realtime-fanout.service';
import { EventNotifierService } from '../events/event-notifier.service';
import { validateAgainstDefinition } from '../../common/utils/data-point-validation.util';
import { TelemetryDataPoint } from '../../common/types/telemetry-value.type';
import { errorMessage } from '../../common/types/telemetry.types';

export interface IngestionWarning {
  metric_name: string;
  timestamp: string;
  message: string;
}

export interface IngestionResult {
  success: boolean;
  ingested_count: number;
  failed_count: number;
  total_count: number;
  errors: string[];
  warnings: IngestionWarning[];
}

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    @Inject(METRIC_CATALOG) private readonly catalog: MetricCatalog,
    @Inject(TIME_SERIES_STORE) private readonly timeSeriesStore: TimeSeriesStore,
    private readonly alertEvaluator: AlertEvaluatorService,
    private readonly fanoutService: RealtimeFanoutService,
    private readonly eventNotifier: EventNotifierService,
    @Inject(TELEMETRY_CONFIG) private readonly config: TelemetryConfig,
  ) {}

  /**
   * Writes the points in order. Validation against metric definitions only
   * produces warnings; a point whose write fails is counted as failed and
   * gets no alert evaluation or fan-out. Never throws.
   */
  async ingest(deviceId: string, points: TelemetryDataPoint[]): Promise<IngestionResult> {
    const total = points.length;
    if (total === 0) {
      return this.emptyResult(true, 0);
    }
    if (total > this.config.maxBatchSize) {
      return {
        ...this.emptyResult(false, total),
        errors: [`Batch of ${total} points exceeds the limit of ${this.config.maxBatchSize}`],
      };
    }

    try {
      const definitions = await this.loadDefinitions(points);
      const errors: string[] = [];
      const warnings: IngestionWarning[] = [];
      let ingested = 0;
      let failed = 0;

      for (const point of points) {
        const definition = definitions.get(point.metric_name);
        if (definition) {
          for (const message of validateAgainstDefinition(point.value, definition)) {
            this.logger.warn(`Validation warning for ${deviceId}/${point.metric_name}: ${message}`);
            warnings.push({ metric_name: point.metric_name, timestamp: point.timestamp.toISOString(), message });
          }
        }

        try {
          await this.timeSeriesStore.writePoint(deviceId, point);
        } catch (error) {
          failed++;
          errors.push(`${point.metric_name}@${point.timestamp.toISOString()}: ${errorMessage(error)}`);
          this.logger.error(`Error ingesting data point for ${deviceId}: ${errorMessage(error)}`);
          continue;
        }
        ingested++;

        await this.alertEvaluator.check(deviceId, point);
        this.fanoutService.notify(deviceId, point);
      }

      if (ingested > 0) {
        this.eventNotifier.publish('telemetry.data.received', {
          device_id: deviceId,
          distinct_metric_count: new Set(points.map(point => point.metric_name)).size,
          ingested_count: ingested,
          timestamp: new Date().toISOString(),
        });
      }

      this.logger.log(`Ingested ${ingested}/${total} data points for device ${deviceId}`);
      return {
        success: true,
        ingested_count: ingested,
        failed_count: failed,
        total_count: total,
        errors: errors.slice(0, this.config.maxReportedErrors),
        warnings,
      };
    } catch (error) {
      this.logger.error(`Error in data ingestion for ${deviceId}: ${errorMessage(error)}`);
      return { ...this.emptyResult(false, total), errors: [errorMessage(error)] };
    }
  }

  async ingestBulk(batches: Record<string, TelemetryDataPoint[]>): Promise<Record<string, IngestionResult>> {
    const results: Record<string, IngestionResult> = {};
    for (const [deviceId, points] of Object.entries(batches)) {
      results[deviceId] = await this.ingest(deviceId, points);
    }
    return results;
  }

  private async loadDefinitions(points: TelemetryDataPoint[]): Promise<Map<string, MetricDefinition>> {
    const names = [...new Set(points.map(point => point.metric_name))];
    const definitions = await this.catalog.getMetricDefinitions(names);
    return new Map(definitions.map(definition => [definition.name, definition]));
  }

  private emptyResult(success: boolean, total: number): IngestionResult {
    return {
      success,
      ingested_count: 0,
      failed_count: total,
      total_count: total,
      errors: [],
      warnings: [],
    };
  }
}
