import { Inject, Injectable, Logger } from '@nestjs/common';
import { MetricDefinition } from '../../database/entities/metric-definition.entity';
import {
  METRIC_CATALOG,
  MetricCatalog,
  MetricListFilter,
} from '../../common/interfaces/telemetry-stores.interface';
import { EventNotifierService } from '../events/event-notifier.service';
import { CreateMetricDefinitionDto } from '../../common/dto/metric-definition.dto';
import { OperationResult, errorMessage } from '../../common/types/telemetry.types';

@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  constructor(
    @Inject(METRIC_CATALOG) private readonly catalog: MetricCatalog,
    private readonly eventNotifier: EventNotifierService,
  ) {}

  /** Idempotent by name: a second definition with a known name returns the stored one. */
  async defineMetric(dto: CreateMetricDefinitionDto, createdBy: string): Promise<OperationResult<MetricDefinition>> {
    try {
      const { definition, created } = await this.catalog.createMetricDefinition({
        name: dto.name,
        description: dto.description ?? null,
        data_type: dto.data_type,
        metric_type: dto.metric_type ?? 'gauge',
        unit: dto.unit ?? null,
        min_value: dto.min_value ?? null,
        max_value: dto.max_value ?? null,
        retention_days: dto.retention_days ?? 90,
        aggregation_interval: dto.aggregation_interval ?? 60,
        tags: dto.tags ?? [],
        metadata: dto.metadata ?? {},
        created_by: createdBy,
      });

      if (created) {
        this.eventNotifier.publish('metric.defined', {
          metric_id: definition.metric_id,
          name: definition.name,
          data_type: definition.data_type,
          metric_type: definition.metric_type,
          unit: definition.unit,
          created_by: createdBy,
          timestamp: new Date().toISOString(),
        });
        this.logger.log(`Defined metric ${definition.name}`);
      }

      return { success: true, data: definition };
    } catch (error) {
      this.logger.error(`Failed to define metric ${dto.name}: ${errorMessage(error)}`);
      return { success: false, error: `Failed to define metric: ${errorMessage(error)}` };
    }
  }

  async getMetric(name: string): Promise<MetricDefinition | null> {
    return await this.catalog.getMetricDefinition(name);
  }

  async listMetrics(filter: MetricListFilter): Promise<MetricDefinition[]> {
    return await this.catalog.listMetricDefinitions(filter);
  }

  /** Historical data for the metric is kept. */
  async deleteMetric(name: string): Promise<boolean> {
    return await this.catalog.deleteMetricDefinition(name);
  }
}
