import type { MessageFilter, MessageQuery } from '../interfaces';
import { isBlank } from '../../shared/params.utils';
import { buildTimestampRange } from './time-window.parser';

export interface MessageListFilters {
  to?: string | null;
  from?: string | null;
  before?: string | null;
  after?: string | null;
}

/**
 * Turns list filters into a store query, newest first.
 * Blank filters are left out. Date errors surface before any store access.
 */
export function buildMessageQuery(filters: MessageListFilters, timeZone: string): MessageQuery {
  const where: MessageFilter = {};

  if (typeof filters.to === 'string' && !isBlank(filters.to)) {
    where.rcpt_to = filters.to;
  }
  if (typeof filters.from === 'string' && !isBlank(filters.from)) {
    where.mail_from = filters.from;
  }

  const timestamp = buildTimestampRange(filters.before, filters.after, timeZone);
  if (timestamp) {
    where.timestamp = timestamp;
  }

  return { where, order: 'timestamp', direction: 'desc' };
}
