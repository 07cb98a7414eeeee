import { Controller, Get, Post, Put, Body, Param, Query, Headers, HttpException, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AlertsService, AlertTransition } from './alerts.service';
import {
  CreateAlertRuleDto,
  ListAlertRulesQueryDto,
  ListAlertsQueryDto,
  ResolveAlertDto,
  SetRuleEnabledQueryDto,
} from '../../common/dto/alert-rule.dto';
import { OperationResult } from '../../common/types/telemetry.types';

@ApiTags('Alerts')
@Controller('telemetry/alerts')
export class AlertsController {
  constructor(private readonly alertsService: AlertsService) {}

  @Post('rules')
  @ApiOperation({ summary: 'Create an alert rule' })
  @ApiResponse({ status: 201, description: 'Alert rule created' })
  async createAlertRule(@Body() dto: CreateAlertRuleDto, @Headers('x-user-id') userId?: string) {
    const result = await this.alertsService.createAlertRule(dto, userId || 'system');
    if (!result.success) {
      throw new HttpException(result.error, HttpStatus.BAD_REQUEST);
    }
    return result.data;
  }

  @Get('rules')
  @ApiOperation({ summary: 'List alert rules' })
  async listAlertRules(@Query() query: ListAlertRulesQueryDto) {
    const rules = await this.alertsService.listAlertRules({
      enabled_only: query.enabled_only,
      metric_name: query.metric_name,
      limit: query.limit ?? 100,
      offset: query.offset ?? 0,
    });
    return { rules, count: rules.length, limit: query.limit ?? 100, offset: query.offset ?? 0 };
  }

  @Get('rules/:ruleId')
  @ApiOperation({ summary: 'Get an alert rule' })
  @ApiResponse({ status: 404, description: 'Alert rule not found' })
  async getAlertRule(@Param('ruleId') ruleId: string) {
    const rule = await this.alertsService.getAlertRule(ruleId);
    if (!rule) {
      throw new HttpException('Alert rule not found', HttpStatus.NOT_FOUND);
    }
    return rule;
  }

  @Put('rules/:ruleId/enable')
  @ApiOperation({ summary: 'Enable or disable an alert rule' })
  async setAlertRuleEnabled(@Param('ruleId') ruleId: string, @Query() query: SetRuleEnabledQueryDto) {
    const enabled = query.enabled ?? true;
    const result = await this.alertsService.setAlertRuleEnabled(ruleId, enabled);
    if (!result.success) {
      throw new HttpException(result.error, HttpStatus.INTERNAL_SERVER_ERROR);
    }
    if (!result.data) {
      throw new HttpException('Alert rule not found', HttpStatus.NOT_FOUND);
    }
    return {
      message: `Alert rule ${enabled ? 'enabled' : 'disabled'} successfully`,
      rule: result.data,
    };
  }

  @Get()
  @ApiOperation({ summary: 'List alerts' })
  @ApiResponse({ status: 200, description: 'Alerts with active and critical counts' })
  async listAlerts(@Query() query: ListAlertsQueryDto) {
    try {
      return await this.alertsService.listAlerts({
        device_id: query.device_id,
        status: query.status,
        level: query.level,
        start_time: query.start_time,
        end_time: query.end_time,
        limit: query.limit ?? 100,
        offset: query.offset ?? 0,
      });
    } catch (error) {
      throw new HttpException('Failed to list alerts', HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }

  @Put(':alertId/acknowledge')
  @ApiOperation({ summary: 'Acknowledge an active alert' })
  @ApiResponse({ status: 409, description: 'Alert is not active' })
  async acknowledgeAlert(@Param('alertId') alertId: string, @Headers('x-user-id') userId?: string) {
    const alert = this.unwrapTransition(await this.alertsService.acknowledgeAlert(alertId, userId || 'system'));
    return { message: 'Alert acknowledged successfully', alert };
  }

  @Put(':alertId/resolve')
  @ApiOperation({ summary: 'Resolve an alert' })
  @ApiResponse({ status: 409, description: 'Alert is already resolved' })
  async resolveAlert(
    @Param('alertId') alertId: string,
    @Body() dto: ResolveAlertDto,
    @Headers('x-user-id') userId?: string,
  ) {
    const alert = this.unwrapTransition(
      await this.alertsService.resolveAlert(alertId, userId || 'system', dto.resolution_note),
    );
    return { message: 'Alert resolved successfully', alert };
  }

  private unwrapTransition(result: OperationResult<AlertTransition>) {
    if (!result.success) {
      throw new HttpException(result.error, HttpStatus.INTERNAL_SERVER_ERROR);
    }
    switch (result.data.outcome) {
      case 'not_found':
        throw new HttpException('Alert not found', HttpStatus.NOT_FOUND);
      case 'invalid_transition':
        throw new HttpException(`Alert is ${result.data.status}`, HttpStatus.CONFLICT);
      case 'updated':
        return result.data.alert;
    }
  }
}
