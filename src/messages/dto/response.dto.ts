import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Common fields of every API envelope
 */
export class EnvelopeDto {
  @ApiProperty({
    description: "'success', 'parameter-error' or 'error'",
    enum: ['success', 'parameter-error', 'error'],
    example: 'success',
  })
  status!: string;

  @ApiProperty({
    description: 'Time spent handling the request, in seconds',
    example: 0.004,
  })
  time!: number;

  @ApiProperty({
    description: 'Reserved for response flags',
    example: {},
  })
  flags!: Record<string, unknown>;
}

/**
 * Response for the message lookup
 */
export class MessageEnvelopeDto extends EnvelopeDto {
  @ApiProperty({
    description:
      'The message projection: `id` and `token`, plus one key per requested expansion group. ' +
      'For errors, `{ message }` or `{ code, message, id }`.',
    example: {
      id: 101,
      token: 'Xk2hQ9aLmN3p',
      status: { status: 'Sent', last_delivery_attempt: 1704461400.0, held: false, hold_expiry: null },
    },
  })
  data!: Record<string, unknown>;
}

/**
 * A single delivery attempt
 */
export class DeliveryDto {
  @ApiProperty({ example: 7001 })
  id!: number;

  @ApiProperty({ example: 'Sent' })
  status!: string;

  @ApiPropertyOptional({ example: 'Message for user@example.com accepted by mx.example.com', nullable: true })
  details!: string | null;

  @ApiPropertyOptional({ description: 'Remote server output, trimmed', example: '250 2.0.0 OK', nullable: true })
  output!: string | null;

  @ApiProperty({ example: true })
  sent_with_ssl!: boolean;

  @ApiPropertyOptional({ example: 'QX7TB2', nullable: true })
  log_id!: string | null;

  @ApiPropertyOptional({ description: 'Event time in epoch seconds', example: 1704461401.25, nullable: true })
  time!: number | null;

  @ApiProperty({ description: 'Record time in epoch seconds', example: 1704461401.3 })
  timestamp!: number;
}

/**
 * Response for the deliveries lookup
 */
export class DeliveriesEnvelopeDto extends EnvelopeDto {
  @ApiProperty({ type: [DeliveryDto] })
  data!: DeliveryDto[];
}

/**
 * Response for the message list
 */
export class MessageListEnvelopeDto extends EnvelopeDto {
  @ApiProperty({
    description: 'Message IDs, or message projections when `_expansions` was given',
    example: [103, 102, 101],
  })
  data!: unknown[];
}
