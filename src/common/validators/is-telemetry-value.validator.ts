import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { isRawTelemetryValue } from '../types/telemetry-value.type';

export const IS_TELEMETRY_VALUE = 'isTelemetryValue';

/** Accepts a finite number, a string, a boolean or a plain object. */
export function IsTelemetryValue(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_TELEMETRY_VALUE,
      validator: {
        validate: (value: unknown): boolean => isRawTelemetryValue(value),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must be a number, string, boolean or JSON object`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
