import type { MessageId } from '../interfaces';

export const MESSAGE_NOT_FOUND_CODE = 'MessageNotFound';

/**
 * A request parameter is missing or malformed.
 * Raised before the store is touched.
 */
export class ParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParameterError';
  }
}

/**
 * A `before`/`after` date filter does not match either accepted format.
 */
export class InvalidDateFormatError extends ParameterError {
  public readonly parameter: string;

  constructor(parameter: string) {
    super(`\`${parameter}\` must be in 'yyyy-mm-dd hh:mm' or 'yyyy-mm-dd' format`);
    this.name = 'InvalidDateFormatError';
    this.parameter = parameter;
  }
}

/**
 * No message matches the requested id. Carries the id as the client sent it.
 */
export class MessageNotFoundError extends Error {
  public readonly code = MESSAGE_NOT_FOUND_CODE;
  public readonly id: MessageId;

  constructor(id: MessageId) {
    super('No message found matching provided ID');
    this.name = 'MessageNotFoundError';
    this.id = id;
  }
}

/**
 * Raised by the store on a missing record. Translated to
 * `MessageNotFoundError` by MessagesService and never rendered directly.
 */
export class MessageRecordNotFoundError extends Error {
  constructor(id: MessageId) {
    super(`Message record not found: ${id}`);
    this.name = 'MessageRecordNotFoundError';
  }
}
