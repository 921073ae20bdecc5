import type { ValidationError } from 'class-validator';

/**
 * Flattens class-validator errors into readable messages.
 * Nested properties are reported with their dotted path, e.g.
 * `messages.0.attachments.1.mimeType must be a string`.
 */
export function formatValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  const messages: string[] = [];

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    for (const constraint of Object.values(error.constraints ?? {})) {
      // class-validator prefixes constraints with the bare property name
      messages.push(parentPath && constraint.startsWith(error.property) ? `${parentPath}.${constraint}` : constraint);
    }

    if (error.children && error.children.length > 0) {
      messages.push(...formatValidationErrors(error.children, path));
    }
  }

  return messages;
}
