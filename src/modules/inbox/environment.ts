import { LogLevel } from '@nestjs/common';
import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateBy,
  ValidationError,
  ValidationOptions,
  buildMessage,
  validateSync,
} from 'class-validator';
import { parseDatabaseUrl } from '../../adapters/storage';

export enum LogLevelName {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const NEST_LOG_LEVELS: Record<LogLevelName, LogLevel[]> = {
  [LogLevelName.DEBUG]: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
  [LogLevelName.INFO]: ['fatal', 'error', 'warn', 'log'],
  [LogLevelName.WARN]: ['fatal', 'error', 'warn'],
  [LogLevelName.ERROR]: ['fatal', 'error'],
};

/**
 * Logger levels enabled by a LOG_LEVEL value
 */
export function toNestLogLevels(level: LogLevelName): LogLevel[] {
  return NEST_LOG_LEVELS[level];
}

function IsDatabaseUrl(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isDatabaseUrl',
      validator: {
        validate: (value: unknown): boolean => {
          if (typeof value !== 'string') return false;
          try {
            parseDatabaseUrl(value);
            return true;
          } catch {
            return false;
          }
        },
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be a postgres://, sqlite:// or memory:// URL`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

/**
 * Process environment schema
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  WEBHOOK_SECRET?: string;

  @IsOptional()
  @IsDatabaseUrl()
  DATABASE_URL?: string;

  @Transform(({ value }) =>
    typeof value === 'string' ? value.trim().toUpperCase() : value,
  )
  @IsEnum(LogLevelName)
  LOG_LEVEL: LogLevelName = LogLevelName.INFO;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8000;

  @IsString()
  @Matches(/^\d+(b|kb|mb|gb)?$/i, {
    message: 'WEBHOOK_BODY_LIMIT must be a size such as 512kb or 1mb',
  })
  WEBHOOK_BODY_LIMIT: string = '1mb';

  @Type(() => Number)
  @IsInt()
  @Min(0)
  STORE_TIMEOUT_MS: number = 5000;
}

/**
 * ConfigModule validate hook: fail startup on any invalid variable
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const environment = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(environment);

  if (errors.length > 0) {
    throw new Error(`Invalid environment: ${formatErrors(errors)}`);
  }

  return environment;
}

function formatErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => Object.values(error.constraints ?? {}).join(', '))
    .join('; ');
}
