import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { TelemetryDataPointDto } from './telemetry-data.dto';
import { RealtimeSubscriptionDto } from './telemetry-query.dto';
import { isStringRecord } from '../validators/is-string-record.validator';

const point = (tags: unknown) =>
  plainToInstance(TelemetryDataPointDto, {
    timestamp: '2024-01-01T00:00:00Z',
    metric_name: 'temperature',
    value: 21.5,
    tags,
  });

describe('tag validation', () => {
  it('accepts string tag values', async () => {
    expect(await validate(point({ site: 'north', line: '2' }))).toEqual([]);
  });

  it('rejects tags with non-string values', async () => {
    const errors = await validate(point({ site: 'north', floor: 3 }));

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('tags');
    expect(errors[0].constraints).toEqual({ isStringRecord: 'tags must be an object of string values' });
  });

  it('applies to real-time subscription filters', async () => {
    const errors = await validate(plainToInstance(RealtimeSubscriptionDto, { tags: { site: ['north'] } }));

    expect(errors.map(error => error.property)).toEqual(['tags']);
  });

  it('recognises string records', () => {
    expect(isStringRecord({})).toBe(true);
    expect(isStringRecord({ site: 'north' })).toBe(true);
    expect(isStringRecord({ enabled: true })).toBe(false);
    expect(isStringRecord(['north'])).toBe(false);
    expect(isStringRecord(null)).toBe(false);
  });
});
