import { DynamicModule, MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { AppConfig } from './config/app.config';
import { ConfigModule } from './config/config.module';
import { NextGenModule } from './nextgen/nextgen.module';
import { TraceMiddleware } from './trace/trace.middleware';
import { TraceModule } from './trace/trace.module';

/**
 * Root Application Module
 *
 * - ConfigModule: startup AppConfig under APP_CONFIG
 * - TraceModule: per-request trace_id
 * - NextGenModule: index, capabilities, heartbeat, generate
 */
@Module({})
export class AppModule implements NestModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(config), TraceModule, NextGenModule],
    };
  }

  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(TraceMiddleware).forRoutes('*');
  }
}
