import { InvalidDateFormatError } from '../../errors/messages.errors';
import { buildTimestampRange, parseTimeBound } from '../time-window.parser';

describe('parseTimeBound', () => {
  it('should read a date as midnight in the given zone', () => {
    expect(parseTimeBound('2024-01-01', 'after', 'UTC')).toBe(1704067200);
  });

  it('should read a date and time in the given zone', () => {
    expect(parseTimeBound('2024-01-05 13:30', 'before', 'UTC')).toBe(1704461400);
  });

  it('should honour a non-UTC zone', () => {
    expect(parseTimeBound('2024-01-05 13:30', 'before', 'America/New_York')).toBe(1704479400);
  });

  it.each(['01-05-2024', '2024/01/05', '', '2024-01-05T13:30', '2024-01-05 13:30:00', 'yesterday'])(
    'should reject %p',
    (value) => {
      expect(() => parseTimeBound(value, 'before', 'UTC')).toThrow(InvalidDateFormatError);
    },
  );

  it.each(['2024-13-45', '2024-01-05 25:99', '2024-02-30', '2023-02-29', '0000-00-00'])(
    'should reject the out-of-range value %p instead of rolling it over',
    (value) => {
      expect(() => parseTimeBound(value, 'after', 'UTC')).toThrow(
        "`after` must be in 'yyyy-mm-dd hh:mm' or 'yyyy-mm-dd' format",
      );
    },
  );

  it('should accept a leap day', () => {
    expect(parseTimeBound('2024-02-29', 'after', 'UTC')).toBe(1709164800);
  });

  it('should name the parameter in the error message', () => {
    expect(() => parseTimeBound('2024/01/05', 'after', 'UTC')).toThrow(
      "`after` must be in 'yyyy-mm-dd hh:mm' or 'yyyy-mm-dd' format",
    );
  });
});

describe('buildTimestampRange', () => {
  it('should return undefined when no bound is given', () => {
    expect(buildTimestampRange(undefined, undefined, 'UTC')).toBeUndefined();
  });

  it('should skip null and blank bounds', () => {
    expect(buildTimestampRange(null, '   ', 'UTC')).toBeUndefined();
  });

  it('should map before to less_than and after to greater_than', () => {
    expect(buildTimestampRange('2024-01-05 13:30', '2024-01-01', 'UTC')).toEqual({
      less_than: 1704461400,
      greater_than: 1704067200,
    });
  });

  it('should report before first when both bounds are malformed', () => {
    expect(() => buildTimestampRange('bad', 'also bad', 'UTC')).toThrow(
      "`before` must be in 'yyyy-mm-dd hh:mm' or 'yyyy-mm-dd' format",
    );
  });

  it('should report after when only after is malformed', () => {
    expect(() => buildTimestampRange('2024-01-01', 'bad', 'UTC')).toThrow(
      "`after` must be in 'yyyy-mm-dd hh:mm' or 'yyyy-mm-dd' format",
    );
  });
});
