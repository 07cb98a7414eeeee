import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsObject,
  IsDate,
  IsArray,
  MaxLength,
  ArrayMaxSize,
  ArrayMinSize,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { IsTelemetryValue } from '../validators/is-telemetry-value.validator';
import { IsStringRecord } from '../validators/is-string-record.validator';
import { RawTelemetryValue, TelemetryDataPoint, toTelemetryValue } from '../types/telemetry-value.type';

export class TelemetryDataPointDto {
  @Type(() => Date)
  @IsDate()
  timestamp!: Date;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  metric_name!: string;

  @IsTelemetryValue()
  value!: RawTelemetryValue;

  @IsString()
  @IsOptional()
  @MaxLength(20)
  unit?: string;

  @IsStringRecord()
  @IsOptional()
  tags?: Record<string, string>;

  @IsObject()
  @IsOptional()
  metadata?: Record<string, unknown>;
}

export class TelemetryBatchDto {
  @IsArray()
  @ArrayMaxSize(1000)
  @ValidateNested({ each: true })
  @Type(() => TelemetryDataPointDto)
  data_points!: TelemetryDataPointDto[];

  @IsString()
  @IsOptional()
  batch_id?: string;
}

export class DeviceTelemetryBatchDto extends TelemetryBatchDto {
  @IsString()
  @IsNotEmpty()
  device_id!: string;
}

export class BulkTelemetryDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => DeviceTelemetryBatchDto)
  batches!: DeviceTelemetryBatchDto[];
}

export function toTelemetryDataPoint(dto: TelemetryDataPointDto): TelemetryDataPoint {
  return {
    timestamp: dto.timestamp,
    metric_name: dto.metric_name,
    value: toTelemetryValue(dto.value),
    unit: dto.unit ?? null,
    tags: dto.tags ?? {},
    metadata: dto.metadata ?? {},
  };
}
