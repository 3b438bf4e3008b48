import { HttpAdapterHost } from '@nestjs/core';
import type { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { allowsAnyOrigin, AppConfig } from './config/app.config';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { createValidationPipe } from './common/pipes/validation.pipe';
import { TraceService } from './trace/trace.service';

/**
 * Fastify adapter shared by the server and the e2e tests.
 * Trailing slashes are ignored so that "/api/nextgen/" reaches the index route.
 */
export function createHttpAdapter(): FastifyAdapter {
  return new FastifyAdapter({ ignoreTrailingSlash: true });
}

export function buildCorsOptions(config: AppConfig): CorsOptions {
  return {
    // true reflects the request origin, which is what "*" means with credentials
    origin: allowsAnyOrigin(config) ? true : config.allowedOrigins,
    credentials: true,
    methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE', 'OPTIONS'],
  };
}

/**
 * Apply the route prefix, CORS, validation and the global fault boundary.
 * Must run before app.init() / app.listen().
 */
export function configureApp(app: NestFastifyApplication, config: AppConfig): NestFastifyApplication {
  app.setGlobalPrefix(config.routePrefix);
  app.enableCors(buildCorsOptions(config));
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new AllExceptionsFilter(app.get(HttpAdapterHost), app.get(TraceService)));
  return app;
}
