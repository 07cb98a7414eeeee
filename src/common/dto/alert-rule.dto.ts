import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsIn,
  IsInt,
  IsBoolean,
  IsArray,
  IsObject,
  IsDate,
  Min,
  Max,
  MaxLength,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import {
  ALERT_CONDITIONS,
  ALERT_LEVELS,
  ALERT_STATUSES,
  AlertCondition,
  AlertLevel,
  AlertStatus,
} from '../types/telemetry.types';

const toBoolean = ({ value }: { value: unknown }) => (typeof value === 'string' ? value === 'true' : value);

export class CreateAlertRuleDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @IsString()
  @IsOptional()
  @MaxLength(1000)
  description?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  metric_name!: string;

  @IsIn(ALERT_CONDITIONS)
  condition!: AlertCondition;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  threshold_value!: string;

  @IsInt()
  @IsOptional()
  @Min(60)
  @Max(3600)
  evaluation_window?: number;

  @IsInt()
  @IsOptional()
  @Min(1)
  @Max(100)
  trigger_count?: number;

  @IsIn(ALERT_LEVELS)
  @IsOptional()
  level?: AlertLevel;

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  device_ids?: string[];

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  device_groups?: string[];

  @IsObject()
  @IsOptional()
  device_filters?: Record<string, unknown>;

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  notification_channels?: string[];

  @IsInt()
  @IsOptional()
  @Min(0)
  @Max(1440)
  cooldown_minutes?: number;

  @IsBoolean()
  @IsOptional()
  auto_resolve?: boolean;

  @IsInt()
  @IsOptional()
  @Min(300)
  @Max(86400)
  auto_resolve_timeout?: number;

  @IsBoolean()
  @IsOptional()
  enabled?: boolean;

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  tags?: string[];
}

export class ListAlertRulesQueryDto {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  enabled_only?: boolean;

  @IsString()
  @IsOptional()
  metric_name?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number = 100;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number = 0;
}

export class SetRuleEnabledQueryDto {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  enabled?: boolean = true;
}

export class ListAlertsQueryDto {
  @IsString()
  @IsOptional()
  device_id?: string;

  @IsIn(ALERT_STATUSES)
  @IsOptional()
  status?: AlertStatus;

  @IsIn(ALERT_LEVELS)
  @IsOptional()
  level?: AlertLevel;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  start_time?: Date;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  end_time?: Date;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number = 100;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number = 0;
}

export class ResolveAlertDto {
  @IsString()
  @IsOptional()
  @MaxLength(1000)
  resolution_note?: string;
}
