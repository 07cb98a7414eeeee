import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsIn,
  IsInt,
  IsArray,
  IsDate,
  Matches,
  Min,
  Max,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { IsStringRecord } from '../validators/is-string-record.validator';
import { AGGREGATION_TYPES, AggregationType, TIME_RANGES, TimeRange } from '../types/telemetry.types';

const toList = ({ value }: { value: unknown }) =>
  typeof value === 'string'
    ? value
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0)
    : value;

export class TelemetryQueryDto {
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  device_ids?: string[];

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  metric_names?: string[];

  @Type(() => Date)
  @IsDate()
  start_time!: Date;

  @Type(() => Date)
  @IsDate()
  end_time!: Date;

  @IsIn(AGGREGATION_TYPES)
  @IsOptional()
  aggregation?: AggregationType;

  @IsInt()
  @IsOptional()
  @Min(60)
  @Max(86400)
  interval?: number;

  @IsInt()
  @IsOptional()
  @Min(1)
  @Max(10000)
  limit?: number = 1000;
}

export class AggregatedQueryDto {
  @IsString()
  @IsOptional()
  device_id?: string;

  @IsString()
  @IsNotEmpty()
  metric_name!: string;

  @IsIn(AGGREGATION_TYPES)
  aggregation_type!: AggregationType;

  @Type(() => Number)
  @IsInt()
  @Min(60)
  @Max(86400)
  interval!: number;

  @Type(() => Date)
  @IsDate()
  start_time!: Date;

  @Type(() => Date)
  @IsDate()
  end_time!: Date;
}

export class MetricRangeQueryDto {
  @IsIn(TIME_RANGES)
  @IsOptional()
  time_range?: TimeRange = '24h';

  @IsIn(AGGREGATION_TYPES)
  @IsOptional()
  aggregation?: AggregationType;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(60)
  @Max(86400)
  interval?: number;
}

export class ExportCsvQueryDto {
  @IsOptional()
  @Transform(toList)
  @IsArray()
  @IsString({ each: true })
  device_ids?: string[];

  @IsOptional()
  @Transform(toList)
  @IsArray()
  @IsString({ each: true })
  metric_names?: string[];

  @Type(() => Date)
  @IsDate()
  start_time!: Date;

  @Type(() => Date)
  @IsDate()
  end_time!: Date;
}

export class RealtimeSubscriptionDto {
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  device_ids?: string[];

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  metric_names?: string[];

  @IsStringRecord()
  @IsOptional()
  tags?: Record<string, string>;

  @IsString()
  @IsOptional()
  @Matches(/^\s*(==|!=|>|<)\s*\S/, { message: 'filter_condition must look like "> 80" or "== online"' })
  filter_condition?: string;

  @IsInt()
  @IsOptional()
  @Min(100)
  @Max(60000)
  max_frequency?: number;
}
