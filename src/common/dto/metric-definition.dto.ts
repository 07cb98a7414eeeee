import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsIn,
  IsInt,
  IsNumber,
  IsArray,
  IsObject,
  Min,
  Max,
  MaxLength,
} from 'class-validator';
import { Type } from 'class-transformer';
import { DATA_TYPES, DataType, METRIC_TYPES, MetricType } from '../types/telemetry.types';

export class CreateMetricDefinitionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @IsString()
  @IsOptional()
  @MaxLength(500)
  description?: string;

  @IsIn(DATA_TYPES)
  data_type!: DataType;

  @IsIn(METRIC_TYPES)
  @IsOptional()
  metric_type?: MetricType;

  @IsString()
  @IsOptional()
  @MaxLength(20)
  unit?: string;

  @IsNumber()
  @IsOptional()
  min_value?: number;

  @IsNumber()
  @IsOptional()
  max_value?: number;

  @IsInt()
  @IsOptional()
  @Min(1)
  @Max(3650)
  retention_days?: number;

  @IsInt()
  @IsOptional()
  @Min(1)
  @Max(86400)
  aggregation_interval?: number;

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  tags?: string[];

  @IsObject()
  @IsOptional()
  metadata?: Record<string, unknown>;
}

export class ListMetricsQueryDto {
  @IsIn(DATA_TYPES)
  @IsOptional()
  data_type?: DataType;

  @IsIn(METRIC_TYPES)
  @IsOptional()
  metric_type?: MetricType;

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
