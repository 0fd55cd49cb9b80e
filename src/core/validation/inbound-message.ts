import {
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  ValidateBy,
  ValidationOptions,
  buildMessage,
} from 'class-validator';
import { normalizeZonedTimestamp } from './timestamp';

/**
 * Optional `+`, then 7 to 15 digits
 */
export const PHONE_NUMBER_PATTERN = /^\+?\d{7,15}$/;

export const MAX_TEXT_LENGTH = 4096;

/**
 * Accepts ISO-8601 date-times that carry `Z` or a `±HH:MM` offset
 */
export function IsZonedTimestamp(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isZonedTimestamp',
      validator: {
        validate: (value: unknown): boolean =>
          normalizeZonedTimestamp(value) !== null,
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be an ISO-8601 timestamp with Z or a UTC offset`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

/**
 * Wire shape of an inbound message webhook body
 */
export class InboundMessagePayload {
  @IsNotEmpty({ message: 'message_id must not be empty' })
  @IsString({ message: 'message_id must be a string' })
  message_id!: string;

  @Matches(PHONE_NUMBER_PATTERN, {
    message: 'from must be a phone number: optional + followed by 7-15 digits',
  })
  from!: string;

  @Matches(PHONE_NUMBER_PATTERN, {
    message: 'to must be a phone number: optional + followed by 7-15 digits',
  })
  to!: string;

  @IsZonedTimestamp()
  ts!: string;

  @IsOptional()
  @MaxLength(MAX_TEXT_LENGTH, {
    message: `text must be at most ${MAX_TEXT_LENGTH} characters`,
  })
  @IsString({ message: 'text must be a string' })
  text?: string | null;
}
