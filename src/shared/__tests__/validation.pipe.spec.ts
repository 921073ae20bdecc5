import type { ArgumentMetadata } from '@nestjs/common';
import { createValidationPipe } from '../validation.pipe';
import { MessageListDto, MessageLookupDto } from '../../messages/dto/message-request.dto';
import { ParameterError } from '../../messages/errors/messages.errors';

describe('createValidationPipe', () => {
  const pipe = createValidationPipe();
  const bodyOf = (metatype: ArgumentMetadata['metatype']): ArgumentMetadata => ({ type: 'body', metatype });

  it('should transform a valid body into its DTO', async () => {
    const result: unknown = await pipe.transform({ id: 101, _expansions: ['status'] }, bodyOf(MessageLookupDto));

    expect(result).toBeInstanceOf(MessageLookupDto);
    expect(result).toEqual({ id: 101, _expansions: ['status'] });
  });

  it('should raise a ParameterError for an invalid field', async () => {
    await expect(pipe.transform({ before: 20240101 }, bodyOf(MessageListDto))).rejects.toThrow(
      new ParameterError('before must be a string'),
    );
  });

  it('should raise a ParameterError for an unknown field', async () => {
    await expect(pipe.transform({ id: 101, colour: 'blue' }, bodyOf(MessageLookupDto))).rejects.toThrow(
      new ParameterError('property colour should not exist'),
    );
  });
});
