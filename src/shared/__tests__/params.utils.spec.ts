import { isBlank } from '../params.utils';

describe('isBlank', () => {
  it.each([undefined, null, '', '   ', '\t\n'])('should treat %p as blank', (value) => {
    expect(isBlank(value)).toBe(true);
  });

  it.each(['a', ' a ', 0, 101, false])('should treat %p as supplied', (value) => {
    expect(isBlank(value)).toBe(false);
  });
});
