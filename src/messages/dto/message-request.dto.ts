import { ApiPropertyOptional, type ApiPropertyOptions } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';
import { EXPANSION_GROUPS, type ExpansionDirectiveInput } from '../expansions/expansion-directive';
import type { MessageId } from '../interfaces';
import { IsExpansionDirective, IsMessageId } from './validators';

const EXPANSIONS_PROPERTY: ApiPropertyOptions = {
  description: `Either \`true\` for every group, or a list of groups to include. Groups: ${EXPANSION_GROUPS.join(', ')}.`,
  oneOf: [{ type: 'boolean' }, { type: 'array', items: { type: 'string', enum: [...EXPANSION_GROUPS] } }],
  example: ['status', 'details'],
};

/**
 * Body for the message and deliveries lookups. The deliveries lookup
 * accepts `_expansions` but ignores it.
 *
 * `id` is optional here so a missing id reaches MessagesService, which
 * reports it as a parameter error before the store is queried.
 */
export class MessageLookupDto {
  @ApiPropertyOptional({
    description: 'The ID of the message.',
    oneOf: [{ type: 'string' }, { type: 'integer' }],
    example: 101,
  })
  @IsOptional()
  @IsMessageId()
  id?: MessageId | null;

  @ApiPropertyOptional(EXPANSIONS_PROPERTY)
  @IsOptional()
  @IsExpansionDirective()
  _expansions?: ExpansionDirectiveInput;
}

export class MessageListDto {
  @ApiPropertyOptional({ description: 'Only messages sent to this exact address.', example: 'user@example.com' })
  @IsOptional()
  @IsString()
  @MaxLength(254)
  to?: string | null;

  @ApiPropertyOptional({ description: 'Only messages sent from this exact address.', example: 'app@example.org' })
  @IsOptional()
  @IsString()
  @MaxLength(254)
  from?: string | null;

  @ApiPropertyOptional({
    description: "Only messages older than this time, as 'yyyy-mm-dd' or 'yyyy-mm-dd hh:mm'.",
    example: '2024-01-31 18:00',
  })
  @IsOptional()
  @IsString()
  before?: string | null;

  @ApiPropertyOptional({
    description: "Only messages newer than this time, as 'yyyy-mm-dd' or 'yyyy-mm-dd hh:mm'.",
    example: '2024-01-01',
  })
  @IsOptional()
  @IsString()
  after?: string | null;

  @ApiPropertyOptional({
    ...EXPANSIONS_PROPERTY,
    description: `${EXPANSIONS_PROPERTY.description ?? ''} Without it, only message IDs are returned.`,
  })
  @IsOptional()
  @IsExpansionDirective()
  _expansions?: ExpansionDirectiveInput;
}
