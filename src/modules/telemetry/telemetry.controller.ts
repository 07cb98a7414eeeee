import {
  Controller,
  Post,
  Get,
  Delete,
  Body,
  Param,
  Query,
  Header,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { IngestionService } from './ingestion.service';
import { AggregationService } from './aggregation.service';
import { TelemetryQueryService } from './telemetry-query.service';
import { RealtimeFanoutService } from '../realtime/realtime-fanout.service';
import {
  BulkTelemetryDto,
  TelemetryBatchDto,
  TelemetryDataPointDto,
  toTelemetryDataPoint,
} from '../../common/dto/telemetry-data.dto';
import {
  AggregatedQueryDto,
  ExportCsvQueryDto,
  MetricRangeQueryDto,
  RealtimeSubscriptionDto,
  TelemetryQueryDto,
} from '../../common/dto/telemetry-query.dto';
import { subscriptionRoom } from '../../common/interfaces/websocket-events.interface';
import { TelemetryDataPoint } from '../../common/types/telemetry-value.type';
import { errorMessage } from '../../common/types/telemetry.types';

@ApiTags('Telemetry')
@Controller('telemetry')
export class TelemetryController {
  constructor(
    private readonly ingestionService: IngestionService,
    private readonly aggregationService: AggregationService,
    private readonly queryService: TelemetryQueryService,
    private readonly fanoutService: RealtimeFanoutService,
  ) {}

  @Post('devices/:deviceId/telemetry')
  @ApiOperation({ summary: 'Ingest a single data point' })
  @ApiResponse({ status: 201, description: 'Ingestion summary' })
  async ingestPoint(@Param('deviceId') deviceId: string, @Body() dto: TelemetryDataPointDto) {
    return await this.ingestionService.ingest(deviceId, [toTelemetryDataPoint(dto)]);
  }

  @Post('devices/:deviceId/telemetry/batch')
  @ApiOperation({ summary: 'Ingest a batch of data points' })
  @ApiResponse({ status: 201, description: 'Ingestion summary with per-point counts' })
  async ingestBatch(@Param('deviceId') deviceId: string, @Body() dto: TelemetryBatchDto) {
    const result = await this.ingestionService.ingest(deviceId, dto.data_points.map(toTelemetryDataPoint));
    return { ...result, batch_id: dto.batch_id ?? null };
  }

  @Post('bulk')
  @ApiOperation({ summary: 'Ingest batches for several devices' })
  async ingestBulk(@Body() dto: BulkTelemetryDto) {
    const batches: Record<string, TelemetryDataPoint[]> = {};
    for (const batch of dto.batches) {
      batches[batch.device_id] = [...(batches[batch.device_id] ?? []), ...batch.data_points.map(toTelemetryDataPoint)];
    }
    const results = await this.ingestionService.ingestBulk(batches);
    return { results, device_count: Object.keys(results).length };
  }

  @Post('query')
  @ApiOperation({ summary: 'Query raw or aggregated data over a time range' })
  async query(@Body() dto: TelemetryQueryDto) {
    try {
      return await this.queryService.queryRange({
        device_ids: dto.device_ids,
        metric_names: dto.metric_names,
        start_time: dto.start_time,
        end_time: dto.end_time,
        aggregation: dto.aggregation,
        interval: dto.interval,
        limit: dto.limit ?? 1000,
      });
    } catch (error) {
      throw new HttpException(`Failed to query telemetry: ${errorMessage(error)}`, HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }

  @Get('devices/:deviceId/metrics')
  @ApiOperation({ summary: 'List metric names a device has reported' })
  async getDeviceMetrics(@Param('deviceId') deviceId: string) {
    const metrics = await this.queryService.getDeviceMetrics(deviceId);
    return { device_id: deviceId, metrics, count: metrics.length };
  }

  @Get('devices/:deviceId/metrics/:metricName/latest')
  @ApiOperation({ summary: 'Latest value of a metric within the last 24 hours' })
  @ApiResponse({ status: 404, description: 'No recent data' })
  async getLatest(@Param('deviceId') deviceId: string, @Param('metricName') metricName: string) {
    const point = await this.queryService.getLatest(deviceId, metricName);
    if (!point) {
      throw new HttpException('No recent data found', HttpStatus.NOT_FOUND);
    }
    return point;
  }

  @Get('devices/:deviceId/metrics/:metricName/range')
  @ApiOperation({ summary: 'Metric data for a predefined time range' })
  async getMetricRange(
    @Param('deviceId') deviceId: string,
    @Param('metricName') metricName: string,
    @Query() query: MetricRangeQueryDto,
  ) {
    return await this.queryService.getMetricRange(
      deviceId,
      metricName,
      query.time_range ?? '24h',
      query.aggregation,
      query.interval,
    );
  }

  @Get('aggregated')
  @ApiOperation({ summary: 'Bucketed aggregate of one metric' })
  async getAggregated(@Query() query: AggregatedQueryDto) {
    try {
      const data = await this.aggregationService.aggregate({
        device_id: query.device_id,
        metric_name: query.metric_name,
        aggregation_type: query.aggregation_type,
        interval_seconds: query.interval,
        start_time: query.start_time,
        end_time: query.end_time,
      });
      return {
        device_id: query.device_id ?? null,
        metric_name: query.metric_name,
        aggregation_type: query.aggregation_type,
        interval: query.interval,
        start_time: query.start_time.toISOString(),
        end_time: query.end_time.toISOString(),
        data_points: data.map(bucket => ({ timestamp: bucket.timestamp.toISOString(), value: bucket.value })),
      };
    } catch (error) {
      throw new HttpException(`Failed to aggregate: ${errorMessage(error)}`, HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }

  @Get('export/csv')
  @Header('Content-Type', 'text/csv')
  @Header('Content-Disposition', 'attachment; filename=telemetry_data.csv')
  @ApiOperation({ summary: 'Export raw data as CSV' })
  async exportCsv(@Query() query: ExportCsvQueryDto) {
    return await this.queryService.exportCsv(
      query.device_ids ?? [],
      query.metric_names ?? [],
      query.start_time,
      query.end_time,
    );
  }

  @Get('devices/:deviceId/stats')
  @ApiOperation({ summary: 'Telemetry statistics for one device' })
  @ApiResponse({ status: 404, description: 'Device has no data' })
  async getDeviceStats(@Param('deviceId') deviceId: string) {
    const stats = await this.queryService.getDeviceStats(deviceId);
    if (!stats) {
      throw new HttpException('No telemetry found for device', HttpStatus.NOT_FOUND);
    }
    return stats;
  }

  @Get('stats')
  @ApiOperation({ summary: 'Service-wide telemetry statistics' })
  async getServiceStats() {
    return await this.queryService.getServiceStats();
  }

  @Post('subscribe')
  @ApiOperation({ summary: 'Create a real-time subscription' })
  @ApiResponse({ status: 201, description: 'Join the returned room over socket.io with subscribe_stream' })
  subscribe(@Body() dto: RealtimeSubscriptionDto) {
    const result = this.fanoutService.subscribe(dto);
    if (!result.success) {
      throw new HttpException(result.error, HttpStatus.BAD_REQUEST);
    }
    return {
      subscription_id: result.data.subscription_id,
      room: subscriptionRoom(result.data.subscription_id),
      event: 'telemetry_data',
      max_frequency: result.data.max_frequency,
    };
  }

  @Delete('subscribe/:subscriptionId')
  @ApiOperation({ summary: 'Remove a real-time subscription' })
  @ApiResponse({ status: 404, description: 'Subscription not found' })
  unsubscribe(@Param('subscriptionId') subscriptionId: string) {
    if (!this.fanoutService.unsubscribe(subscriptionId)) {
      throw new HttpException('Subscription not found', HttpStatus.NOT_FOUND);
    }
    return { message: 'Subscription removed', subscription_id: subscriptionId };
  }
}
