/**
 * Expansion groups a message projection can include, in output order.
 */
export const EXPANSION_GROUPS = [
  'status',
  'details',
  'inspection',
  'plain_body',
  'html_body',
  'attachments',
  'headers',
  'raw_message',
  'activity_entries',
] as const;

export type ExpansionGroup = (typeof EXPANSION_GROUPS)[number];

/**
 * `_expansions` as it arrives in a request body.
 */
export type ExpansionDirectiveInput = boolean | string[] | null | undefined;

export type ExpansionDirective =
  | { readonly kind: 'absent' }
  | { readonly kind: 'all' }
  | { readonly kind: 'named'; readonly groups: ReadonlySet<string> };

const ABSENT: ExpansionDirective = { kind: 'absent' };
const ALL: ExpansionDirective = { kind: 'all' };

/**
 * `true` selects every group, an array selects the groups it names
 * (even when empty), anything else means no directive was given.
 */
export function parseExpansionDirective(input: ExpansionDirectiveInput): ExpansionDirective {
  if (input === true) {
    return ALL;
  }
  if (Array.isArray(input)) {
    return { kind: 'named', groups: new Set(input) };
  }
  return ABSENT;
}

/**
 * Names are matched exactly and case-sensitively.
 */
export function isExpansionActive(directive: ExpansionDirective, group: string): boolean {
  switch (directive.kind) {
    case 'all':
      return true;
    case 'named':
      return directive.groups.has(group);
    case 'absent':
      return false;
  }
}
