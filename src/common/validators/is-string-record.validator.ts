import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';

export const IS_STRING_RECORD = 'isStringRecord';

export function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(entry => typeof entry === 'string')
  );
}

/** Accepts a plain object whose values are all strings, as tags are stored. */
export function IsStringRecord(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_STRING_RECORD,
      validator: {
        validate: (value: unknown): boolean => isStringRecord(value),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must be an object of string values`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
