import { ALERT_CONDITIONS, AlertCondition } from '../types/telemetry.types';
import { TelemetryValue, formatTelemetryValue } from '../types/telemetry-value.type';

export function parseNumericThreshold(threshold: string): number | null {
  const trimmed = threshold.trim();
  if (trimmed === '') {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function isAlertCondition(raw: string): raw is AlertCondition {
  return ALERT_CONDITIONS.some(condition => condition === raw);
}

/**
 * Evaluates `value <condition> threshold`.
 *
 * Numeric comparison is used when the value is numeric and the threshold
 * parses as a number. Otherwise only `==` and `!=` can match, comparing the
 * canonical string form of the value with the raw threshold.
 */
export function evaluateCondition(condition: AlertCondition, threshold: string, value: TelemetryValue): boolean {
  const numericThreshold = parseNumericThreshold(threshold);

  if (value.kind === 'numeric' && numericThreshold !== null) {
    switch (condition) {
      case '>':
        return value.value > numericThreshold;
      case '<':
        return value.value < numericThreshold;
      case '==':
        return value.value === numericThreshold;
      case '!=':
        return value.value !== numericThreshold;
    }
  }

  switch (condition) {
    case '==':
      return formatTelemetryValue(value) === threshold;
    case '!=':
      return formatTelemetryValue(value) !== threshold;
    default:
      return false;
  }
}

export interface FilterExpression {
  condition: AlertCondition;
  threshold: string;
}

const EXPRESSION_PATTERN = /^\s*(==|!=|>|<)\s*(.+?)\s*$/;

/** Parses expressions such as `"> 80"` or `"== online"`. */
export function parseFilterExpression(expression: string): FilterExpression | null {
  const match = EXPRESSION_PATTERN.exec(expression);
  if (!match || !isAlertCondition(match[1])) {
    return null;
  }
  return { condition: match[1], threshold: match[2] };
}
