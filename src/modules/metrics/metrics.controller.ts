import { Controller, Get, Post, Delete, Body, Param, Query, Headers, HttpException, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MetricsService } from './metrics.service';
import { CreateMetricDefinitionDto, ListMetricsQueryDto } from '../../common/dto/metric-definition.dto';

@ApiTags('Metrics')
@Controller('telemetry/metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Post()
  @ApiOperation({ summary: 'Define a metric (returns the existing definition for a known name)' })
  @ApiResponse({ status: 201, description: 'Metric definition' })
  async defineMetric(@Body() dto: CreateMetricDefinitionDto, @Headers('x-user-id') userId?: string) {
    const result = await this.metricsService.defineMetric(dto, userId || 'system');
    if (!result.success) {
      throw new HttpException(result.error, HttpStatus.BAD_REQUEST);
    }
    return result.data;
  }

  @Get()
  @ApiOperation({ summary: 'List metric definitions' })
  async listMetrics(@Query() query: ListMetricsQueryDto) {
    const limit = query.limit ?? 100;
    const offset = query.offset ?? 0;
    const metrics = await this.metricsService.listMetrics({
      data_type: query.data_type,
      metric_type: query.metric_type,
      limit,
      offset,
    });
    return { metrics, count: metrics.length, limit, offset };
  }

  @Get(':metricName')
  @ApiOperation({ summary: 'Get a metric definition' })
  @ApiResponse({ status: 404, description: 'Metric not found' })
  async getMetric(@Param('metricName') metricName: string) {
    const metric = await this.metricsService.getMetric(metricName);
    if (!metric) {
      throw new HttpException('Metric definition not found', HttpStatus.NOT_FOUND);
    }
    return metric;
  }

  @Delete(':metricName')
  @ApiOperation({ summary: 'Delete a metric definition' })
  @ApiResponse({ status: 404, description: 'Metric not found' })
  async deleteMetric(@Param('metricName') metricName: string) {
    const deleted = await this.metricsService.deleteMetric(metricName);
    if (!deleted) {
      throw new HttpException('Metric definition not found', HttpStatus.NOT_FOUND);
    }
    return { message: 'Metric definition deleted successfully' };
  }
}
