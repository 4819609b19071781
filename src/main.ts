import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { DispatchExceptionFilter } from './common/filters/dispatch-exception.filter';
import { APP_CONFIG, AppConfig } from './config/app-config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get<AppConfig>(APP_CONFIG);

  if (config.corsOrigin) {
    app.enableCors({
      origin: config.corsOrigin,
      methods: 'GET,HEAD,POST,DELETE',
      credentials: true,
    });
  }

  // Domain errors that escape a service still get a JSON body with the right status.
  app.useGlobalFilters(new DispatchExceptionFilter(app.get(HttpAdapterHost)));

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Outbound call campaigns')
      .setDescription('Rate-limited outbound calling with retries and per-contact results')
      .setVersion('1.0')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  // Lets onModuleDestroy cancel active runs on SIGTERM.
  app.enableShutdownHooks();

  await app.listen(config.port);
  new Logger('Bootstrap').log(`[bootstrap] listening on ${config.port} (provider=${config.callProvider})`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(`[bootstrap] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
