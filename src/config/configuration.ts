import { registerAs } from '@nestjs/config';

export type DatabaseType = 'postgres' | 'sqljs';

/** Spellings accepted for boolean environment variables, any case. */
export const FLAG_VALUES = ['true', 'false', '1', '0', 'yes', 'no'];
const TRUTHY = ['true', '1', 'yes'];

const flag = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined ? fallback : TRUTHY.includes(value.toLowerCase());

export const appConfig = registerAs('app', () => ({
  port: parseInt(process.env.PORT ?? '3333', 10),
  corsOrigin: process.env.CORS_ORIGIN ?? '*',
}));

export const databaseConfig = registerAs('database', () => {
  const type: DatabaseType =
    process.env.DATABASE_TYPE === 'postgres' ? 'postgres' : 'sqljs';

  return {
    type,
    url: process.env.DATABASE_URL,
    name: process.env.DATABASE_NAME ?? ':memory:',
    // an in-memory database has no schema until TypeORM creates it
    synchronize: flag(process.env.DATABASE_SYNCHRONIZE, type === 'sqljs'),
    seed: flag(process.env.DATABASE_SEED, false),
  };
});

export const catsConfig = registerAs('cats', () => ({
  pageSize: parseInt(process.env.CATS_PAGE_SIZE ?? '20', 10),
  maxPageSize: 100,
}));
