import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';
import { HttpExceptionFilter } from './common/exceptions/http-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { resolveLogLevels } from './common/logging/log-levels';

async function bootstrap() {
  const bootConfig = new ConfigService();
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(bootConfig.getOrDefault('LOG_LEVEL', 'debug')),
  });
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  // Global pipes, filters, and interceptors
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  // API prefix
  app.setGlobalPrefix('api/v1');

  // CORS configuration: allow list via CORS_ORIGIN env (comma-separated)
  const corsEnv = configService.getOrDefault('CORS_ORIGIN', '');
  const allowedOrigins = corsEnv ? corsEnv.split(',').map((s) => s.trim()) : ['http://localhost:8080'];
  app.enableCors({
    origin: allowedOrigins,
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE,OPTIONS',
    credentials: true,
  });

  // Swagger documentation
  const config = new DocumentBuilder()
    .setTitle('Library Loans API')
    .setDescription('Catalog, borrowers and the loan lifecycle')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  app.enableShutdownHooks();

  const port = configService.getNumber('PORT', 5000);
  const host = configService.getOrDefault('HOST', '0.0.0.0');
  await app.listen(port, host);

  logger.log(`API listening on http://localhost:${port}/api/v1`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').fatal(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
