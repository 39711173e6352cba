import { plainToInstance, Transform } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';
import { FLAG_VALUES } from './configuration';

const lowerCase = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.toLowerCase() : value;

class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  CORS_ORIGIN?: string;

  @IsOptional()
  @IsIn(['postgres', 'sqljs'])
  DATABASE_TYPE?: string;

  @ValidateIf((env: EnvironmentVariables) => env.DATABASE_TYPE === 'postgres')
  @IsString()
  DATABASE_URL?: string;

  @IsOptional()
  @IsString()
  DATABASE_NAME?: string;

  @IsOptional()
  @Transform(lowerCase)
  @IsIn(FLAG_VALUES)
  DATABASE_SYNCHRONIZE?: string;

  @IsOptional()
  @Transform(lowerCase)
  @IsIn(FLAG_VALUES)
  DATABASE_SEED?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  CATS_PAGE_SIZE?: number;
}

/**
 * Checks the process environment when `ConfigModule` loads. Numeric
 * variables are converted so `@IsInt` sees numbers, the rest stay strings.
 */
export function validateEnvironment(config: Record<string, unknown>) {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return config;
}
