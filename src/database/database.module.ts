import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { Cat } from '../cats/entities/cat.entity';
import { databaseConfig } from '../config/configuration';

const IN_MEMORY = ':memory:';

export function typeOrmOptions(
  config: ConfigType<typeof databaseConfig>,
): TypeOrmModuleOptions {
  const common = {
    entities: [Cat],
    synchronize: config.synchronize,
  };

  if (config.type === 'postgres') {
    return { ...common, type: 'postgres', url: config.url };
  }
  if (config.name === IN_MEMORY) {
    return { ...common, type: 'sqljs' };
  }
  // sql.js keeps the database in memory and writes the whole file after each change
  return { ...common, type: 'sqljs', location: config.name, autoSave: true };
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (config: ConfigType<typeof databaseConfig>) => typeOrmOptions(config),
    }),
  ],
})
export class DatabaseModule {}
