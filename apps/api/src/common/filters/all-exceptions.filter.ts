import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { ApiErrorDto, FaultKind, INTERNAL_SERVER_ERROR_DETAIL } from '@nextgen/shared';
import { TraceService } from '../../trace/trace.service';
import { describeError, FaultException } from '../errors/fault';

export interface ErrorResponse {
  status: number;
  body: ApiErrorDto;
}

/**
 * Global fault boundary.
 *
 * Every exception leaving a route handler (or the not-found handler) ends here
 * and is rendered as { detail }:
 * - FaultException: the fault's bound status and detail; Generic faults are
 *   flattened to a 500 "Internal server error"
 * - other HttpExceptions (unknown route, etc.): their own status and message
 * - Fastify client errors (empty JSON body, unsupported media type, ...):
 *   the 4xx in their statusCode and their message
 * - anything else: 500 "Internal server error", logged with its stack
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(
    private readonly httpAdapterHost: HttpAdapterHost,
    private readonly traceService: TraceService,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const { status, body } = this.resolve(exception);

    httpAdapter.reply(host.switchToHttp().getResponse(), body, status);
  }

  resolve(exception: unknown): ErrorResponse {
    if (exception instanceof FaultException) {
      if (exception.fault.kind === FaultKind.GENERIC) {
        this.logger.error(`[${this.traceLabel()}] ${exception.fault.detail}`);
        return internalServerError();
      }
      return { status: exception.getStatus(), body: { detail: exception.fault.detail } };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const detail = httpExceptionDetail(exception);
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`[${this.traceLabel()}] ${status} ${detail}`);
      } else {
        this.logger.warn(`[${this.traceLabel()}] ${status} ${detail}`);
      }
      return { status, body: { detail } };
    }

    const clientStatus = clientErrorStatus(exception);
    if (clientStatus !== undefined && exception instanceof Error) {
      this.logger.warn(`[${this.traceLabel()}] ${clientStatus} ${exception.message}`);
      return { status: clientStatus, body: { detail: exception.message } };
    }

    const stack = exception instanceof Error ? exception.stack : undefined;
    this.logger.error(
      `[${this.traceLabel()}] Unhandled error: ${describeError(exception)}`,
      stack,
    );
    return internalServerError();
  }

  private traceLabel(): string {
    return this.traceService.getTraceId() ?? 'no-trace';
  }
}

function internalServerError(): ErrorResponse {
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { detail: INTERNAL_SERVER_ERROR_DETAIL },
  };
}

/**
 * The 4xx status an error raised by Fastify itself carries, if any.
 */
function clientErrorStatus(exception: unknown): number | undefined {
  if (typeof exception !== 'object' || exception === null || !('statusCode' in exception)) {
    return undefined;
  }
  const { statusCode } = exception;
  if (
    typeof statusCode === 'number' &&
    statusCode >= HttpStatus.BAD_REQUEST &&
    statusCode < HttpStatus.INTERNAL_SERVER_ERROR
  ) {
    return statusCode;
  }
  return undefined;
}

function httpExceptionDetail(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;

  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.map(String).join('; ');
  }
  return exception.message;
}
