import { buildMessage, ValidateBy, type ValidationOptions } from 'class-validator';

export function isMessageIdValue(value: unknown): boolean {
  return typeof value === 'string' || (typeof value === 'number' && Number.isSafeInteger(value));
}

export function isExpansionDirectiveValue(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return true;
  }
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Message ids are opaque: either a string or an integer.
 */
export function IsMessageId(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isMessageId',
      validator: {
        validate: (value): boolean => isMessageIdValue(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a string or an integer`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

/**
 * `_expansions` is `true`, `false`, or a list of group names.
 */
export function IsExpansionDirective(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isExpansionDirective',
      validator: {
        validate: (value): boolean => isExpansionDirectiveValue(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be true, false or an array of expansion names`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
