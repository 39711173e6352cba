import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { CatsModule } from './cats/cats.module';
import { CatsExceptionFilter } from './common/filters/cats-exception.filter';
import { RequestLoggerMiddleware } from './common/middleware/request-logger.middleware';
import { createValidationPipe } from './common/pipes/validation.pipe';
import { appConfig, catsConfig, databaseConfig } from './config/configuration';
import { validateEnvironment } from './config/env.validation';
import { DatabaseModule } from './database/database.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, catsConfig],
      validate: validateEnvironment,
    }),
    DatabaseModule,
    CatsModule,
  ],
  providers: [
    { provide: APP_PIPE, useFactory: createValidationPipe },
    { provide: APP_FILTER, useClass: CatsExceptionFilter },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestLoggerMiddleware).forRoutes('*');
  }
}
