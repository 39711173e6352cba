import { INestApplication } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { appConfig } from './config/configuration';

export const API_PREFIX = 'api';

/** Application-level settings shared by `main.ts` and the HTTP tests. */
export function configureApp(app: INestApplication): INestApplication {
  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  app.setGlobalPrefix(API_PREFIX);
  app.enableCors({
    origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(','),
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE,OPTIONS',
    credentials: true,
  });
  app.enableShutdownHooks();

  return app;
}
