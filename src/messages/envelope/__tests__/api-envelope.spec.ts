import { renderError, renderSuccess } from '../api-envelope';
import { InvalidDateFormatError, MessageNotFoundError, ParameterError } from '../../errors/messages.errors';

describe('renderSuccess', () => {
  it('should wrap data with status, time and empty flags', () => {
    expect(renderSuccess([1, 2], 0.25)).toEqual({ status: 'success', time: 0.25, flags: {}, data: [1, 2] });
  });
});

describe('renderError', () => {
  it('should render a parameter error', () => {
    expect(renderError(new ParameterError('`id` parameter is required but is missing'), 0.01)).toEqual({
      status: 'parameter-error',
      time: 0.01,
      flags: {},
      data: { message: '`id` parameter is required but is missing' },
    });
  });

  it('should render a date format error as a parameter error', () => {
    expect(renderError(new InvalidDateFormatError('before'), 0)).toEqual({
      status: 'parameter-error',
      time: 0,
      flags: {},
      data: { message: "`before` must be in 'yyyy-mm-dd hh:mm' or 'yyyy-mm-dd' format" },
    });
  });

  it('should render a missing message with its code and id', () => {
    expect(renderError(new MessageNotFoundError('abc'), 0)).toEqual({
      status: 'error',
      time: 0,
      flags: {},
      data: { code: 'MessageNotFound', message: 'No message found matching provided ID', id: 'abc' },
    });
  });

  it('should leave other errors unrendered', () => {
    expect(renderError(new Error('boom'), 0)).toBeUndefined();
    expect(renderError('boom', 0)).toBeUndefined();
  });
});
