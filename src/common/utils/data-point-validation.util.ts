import { DataType } from '../types/telemetry.types';
import { TelemetryValue, TelemetryValueKind } from '../types/telemetry-value.type';

const EXPECTED_KINDS: Record<DataType, TelemetryValueKind[]> = {
  numeric: ['numeric'],
  string: ['string'],
  boolean: ['boolean'],
  json: ['json'],
  geolocation: ['json'],
  binary: ['string'],
  timestamp: ['string', 'numeric'],
};

export interface MetricConstraints {
  data_type: DataType;
  min_value: number | null;
  max_value: number | null;
}

/**
 * Checks a value against a metric definition. Returns the list of problems,
 * empty when the value conforms.
 */
export function validateAgainstDefinition(value: TelemetryValue, definition: MetricConstraints): string[] {
  const problems: string[] = [];
  const expected = EXPECTED_KINDS[definition.data_type];

  if (!expected.includes(value.kind)) {
    problems.push(`expected ${definition.data_type} value, got ${value.kind}`);
  }

  if (value.kind === 'numeric') {
    if (definition.min_value !== null && value.value < definition.min_value) {
      problems.push(`value ${value.value} is below minimum ${definition.min_value}`);
    }
    if (definition.max_value !== null && value.value > definition.max_value) {
      problems.push(`value ${value.value} is above maximum ${definition.max_value}`);
    }
  }

  return problems;
}
