import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { MessageListDto, MessageLookupDto } from '../message-request.dto';
import { isExpansionDirectiveValue, isMessageIdValue } from '../validators';

describe('isMessageIdValue', () => {
  it.each([101, 0, '101', 'abc', ''])('should accept %p', (value) => {
    expect(isMessageIdValue(value)).toBe(true);
  });

  it.each([1.5, Number.NaN, true, null, {}])('should reject %p', (value) => {
    expect(isMessageIdValue(value)).toBe(false);
  });
});

describe('isExpansionDirectiveValue', () => {
  it('should accept booleans and string lists', () => {
    expect(isExpansionDirectiveValue(true)).toBe(true);
    expect(isExpansionDirectiveValue(false)).toBe(true);
    expect(isExpansionDirectiveValue([])).toBe(true);
    expect(isExpansionDirectiveValue(['status', 'bogus'])).toBe(true);
  });

  it('should reject other shapes', () => {
    expect(isExpansionDirectiveValue('status')).toBe(false);
    expect(isExpansionDirectiveValue(['status', 1])).toBe(false);
    expect(isExpansionDirectiveValue({ status: true })).toBe(false);
  });
});

describe('request DTOs', () => {
  it('should accept a lookup without an id', () => {
    expect(validateSync(plainToInstance(MessageLookupDto, {}))).toEqual([]);
  });

  it('should accept a null id', () => {
    expect(validateSync(plainToInstance(MessageLookupDto, { id: null }))).toEqual([]);
  });

  it('should report a malformed id', () => {
    const [error] = validateSync(plainToInstance(MessageLookupDto, { id: { value: 1 } }));

    expect(error.constraints).toEqual({ isMessageId: 'id must be a string or an integer' });
  });

  it('should report a malformed expansions directive', () => {
    const [error] = validateSync(plainToInstance(MessageListDto, { _expansions: 'status' }));

    expect(error.constraints).toEqual({
      isExpansionDirective: '_expansions must be true, false or an array of expansion names',
    });
  });

  it('should report a non-string filter', () => {
    const [error] = validateSync(plainToInstance(MessageListDto, { before: 20240101 }));

    expect(error.constraints).toEqual({ isString: 'before must be a string' });
  });
});
