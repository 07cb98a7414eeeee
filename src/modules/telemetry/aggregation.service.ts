import { Inject, Injectable } from '@nestjs/common';
import { TIME_SERIES_STORE, TimeSeriesStore } from '../../common/interfaces/telemetry-stores.interface';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import { AggregatedPoint, bucketAggregate } from '../../common/utils/aggregation.util';
import { AggregationType } from '../../common/types/telemetry.types';

export interface AggregationRequest {
  /** Omitted means all devices. */
  device_id?: string;
  metric_name: string;
  aggregation_type: AggregationType;
  interval_seconds: number;
  start_time: Date;
  end_time: Date;
}

@Injectable()
export class AggregationService {
  constructor(
    @Inject(TIME_SERIES_STORE) private readonly timeSeriesStore: TimeSeriesStore,
    @Inject(TELEMETRY_CONFIG) private readonly config: TelemetryConfig,
  ) {}

  async aggregate(request: AggregationRequest): Promise<AggregatedPoint[]> {
    if (request.interval_seconds <= 0 || request.end_time.getTime() <= request.start_time.getTime()) {
      return [];
    }

    const points = await this.timeSeriesStore.queryPoints({
      device_ids: request.device_id ? [request.device_id] : undefined,
      metric_names: [request.metric_name],
      start_time: request.start_time,
      end_time: request.end_time,
      limit: this.config.aggregationFetchLimit,
    });

    return bucketAggregate(
      points,
      request.aggregation_type,
      request.interval_seconds,
      request.start_time,
      request.end_time,
    );
  }
}
