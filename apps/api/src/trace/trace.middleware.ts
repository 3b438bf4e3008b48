import { Injectable, NestMiddleware } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { TraceService } from './trace.service';

export const TRACE_ID_HEADER = 'x-trace-id';

/**
 * Middleware to generate and attach trace_id to each request.
 * Uses AsyncLocalStorage to make trace_id available throughout the request lifecycle.
 *
 * Under the Fastify adapter, Nest middleware receives the raw Node request/response.
 */
@Injectable()
export class TraceMiddleware implements NestMiddleware {
  constructor(private readonly traceService: TraceService) {}

  use(req: FastifyRequest['raw'], res: FastifyReply['raw'], next: () => void): void {
    // Accept a caller-supplied trace_id, otherwise generate a new one
    const header = req.headers[TRACE_ID_HEADER];
    const traceIdHeader = Array.isArray(header) ? header[0] : header;

    this.traceService.run(traceIdHeader, () => {
      const traceId = this.traceService.getTraceId();
      if (traceId) {
        res.setHeader('X-Trace-Id', traceId);
      }
      next();
    });
  }
}
