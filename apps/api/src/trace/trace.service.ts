import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

/**
 * Holds the trace_id of the current request in AsyncLocalStorage.
 */
@Injectable()
export class TraceService {
  private readonly asyncLocalStorage = new AsyncLocalStorage<string>();

  /**
   * Run fn with traceId (or a fresh one when absent) as the current trace.
   */
  run<T>(traceId: string | undefined, fn: () => T): T {
    const id = traceId && traceId.trim().length > 0 ? traceId.trim() : this.generateTraceId();
    return this.asyncLocalStorage.run(id, fn);
  }

  getTraceId(): string | undefined {
    return this.asyncLocalStorage.getStore();
  }

  private generateTraceId(): string {
    return randomUUID();
  }
}
