import { EXPANSION_GROUPS, isExpansionActive, parseExpansionDirective } from '../expansion-directive';

describe('parseExpansionDirective', () => {
  it('should treat true as every group', () => {
    expect(parseExpansionDirective(true)).toEqual({ kind: 'all' });
  });

  it.each([false, null, undefined])('should treat %p as no directive', (input) => {
    expect(parseExpansionDirective(input)).toEqual({ kind: 'absent' });
  });

  it('should keep the named groups of an array', () => {
    const directive = parseExpansionDirective(['status', 'headers']);

    expect(directive.kind).toBe('named');
    expect(isExpansionActive(directive, 'status')).toBe(true);
    expect(isExpansionActive(directive, 'headers')).toBe(true);
    expect(isExpansionActive(directive, 'details')).toBe(false);
  });

  it('should treat an empty array as a directive that selects nothing', () => {
    const directive = parseExpansionDirective([]);

    expect(directive.kind).toBe('named');
    EXPANSION_GROUPS.forEach((group) => expect(isExpansionActive(directive, group)).toBe(false));
  });
});

describe('isExpansionActive', () => {
  it('should activate every group for the all directive', () => {
    const directive = parseExpansionDirective(true);

    EXPANSION_GROUPS.forEach((group) => expect(isExpansionActive(directive, group)).toBe(true));
  });

  it('should activate nothing without a directive', () => {
    const directive = parseExpansionDirective(undefined);

    EXPANSION_GROUPS.forEach((group) => expect(isExpansionActive(directive, group)).toBe(false));
  });

  it('should match names case-sensitively', () => {
    const directive = parseExpansionDirective(['Status', 'DETAILS']);

    expect(isExpansionActive(directive, 'status')).toBe(false);
    expect(isExpansionActive(directive, 'details')).toBe(false);
  });

  it('should ignore unknown names', () => {
    const directive = parseExpansionDirective(['bogus', 'status']);

    expect(isExpansionActive(directive, 'status')).toBe(true);
    expect(isExpansionActive(directive, 'bogus')).toBe(true);
    expect(EXPANSION_GROUPS.filter((group) => isExpansionActive(directive, group))).toEqual(['status']);
  });
});

describe('EXPANSION_GROUPS', () => {
  it('should list the groups in output order', () => {
    expect(EXPANSION_GROUPS).toEqual([
      'status',
      'details',
      'inspection',
      'plain_body',
      'html_body',
      'attachments',
      'headers',
      'raw_message',
      'activity_entries',
    ]);
  });
});
