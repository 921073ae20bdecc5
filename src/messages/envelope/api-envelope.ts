import { MessageNotFoundError, ParameterError } from '../errors/messages.errors';
import type { MessageId } from '../interfaces';

export interface EnvelopeFlags {
  [flag: string]: unknown;
}

export interface SuccessEnvelope<T> {
  status: 'success';
  time: number;
  flags: EnvelopeFlags;
  data: T;
}

export interface ParameterErrorEnvelope {
  status: 'parameter-error';
  time: number;
  flags: EnvelopeFlags;
  data: { message: string };
}

export interface MessageNotFoundEnvelope {
  status: 'error';
  time: number;
  flags: EnvelopeFlags;
  data: { code: MessageNotFoundError['code']; message: string; id: MessageId };
}

export type ErrorEnvelope = ParameterErrorEnvelope | MessageNotFoundEnvelope;
export type ApiEnvelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

export function renderSuccess<T>(data: T, time: number): SuccessEnvelope<T> {
  return { status: 'success', time, flags: {}, data };
}

/**
 * Renders the errors this API reports in-band.
 *
 * @returns undefined for any other error, which the caller must rethrow
 */
export function renderError(error: unknown, time: number): ErrorEnvelope | undefined {
  if (error instanceof ParameterError) {
    return { status: 'parameter-error', time, flags: {}, data: { message: error.message } };
  }

  if (error instanceof MessageNotFoundError) {
    return {
      status: 'error',
      time,
      flags: {},
      data: { code: error.code, message: error.message, id: error.id },
    };
  }

  return undefined;
}
