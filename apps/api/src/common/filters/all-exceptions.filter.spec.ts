import {
  BadRequestException,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { FaultKind } from '@nextgen/shared';
import { TraceService } from '../../trace/trace.service';
import { fault, FaultException } from '../errors/fault';
import { AllExceptionsFilter } from './all-exceptions.filter';

describe('AllExceptionsFilter', () => {
  let filter: AllExceptionsFilter;
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    filter = new AllExceptionsFilter(new HttpAdapterHost(), new TraceService());
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should render a fault with its bound status and detail', () => {
    const result = filter.resolve(
      new FaultException(fault(FaultKind.TIMEOUT, 'LLM provider did not respond within 50ms')),
    );

    expect(result).toEqual({
      status: 504,
      body: { detail: 'LLM provider did not respond within 50ms' },
    });
  });

  it('should render an invalid payload fault as 400', () => {
    const result = filter.resolve(
      new FaultException(fault(FaultKind.INVALID_PAYLOAD, 'task_name must be a string')),
    );

    expect(result).toEqual({ status: 400, body: { detail: 'task_name must be a string' } });
  });

  it('should hide the detail of a generic fault and log it', () => {
    const result = filter.resolve(
      new FaultException(fault(FaultKind.GENERIC, 'Unhandled error in /generate: boom')),
    );

    expect(result).toEqual({ status: 500, body: { detail: 'Internal server error' } });
    expect(errorSpy).toHaveBeenCalledWith('[no-trace] Unhandled error in /generate: boom');
  });

  it('should render framework HttpExceptions with their own status and message', () => {
    const result = filter.resolve(new NotFoundException('Cannot GET /api/nextgen/missing'));

    expect(result).toEqual({
      status: 404,
      body: { detail: 'Cannot GET /api/nextgen/missing' },
    });
    expect(warnSpy).toHaveBeenCalledWith('[no-trace] 404 Cannot GET /api/nextgen/missing');
  });

  it('should join message arrays of HttpExceptions', () => {
    const result = filter.resolve(new BadRequestException(['first problem', 'second problem']));

    expect(result).toEqual({ status: 400, body: { detail: 'first problem; second problem' } });
  });

  it('should log 5xx HttpExceptions as errors', () => {
    const result = filter.resolve(new InternalServerErrorException('database exploded'));

    expect(result).toEqual({ status: 500, body: { detail: 'database exploded' } });
    expect(errorSpy).toHaveBeenCalledWith('[no-trace] 500 database exploded');
  });

  it('should flatten unknown errors to a 500 without leaking their message', () => {
    const error = new TypeError('secret internals');
    const result = filter.resolve(error);

    expect(result).toEqual({ status: 500, body: { detail: 'Internal server error' } });
    expect(errorSpy).toHaveBeenCalledWith(
      '[no-trace] Unhandled error: secret internals',
      error.stack,
    );
  });

  it('should render Fastify client errors with their own 4xx status', () => {
    const error = Object.assign(
      new Error("Body cannot be empty when content-type is set to 'application/json'"),
      { code: 'FST_ERR_CTP_EMPTY_JSON_BODY', statusCode: 400 },
    );

    expect(filter.resolve(error)).toEqual({
      status: 400,
      body: { detail: "Body cannot be empty when content-type is set to 'application/json'" },
    });
    expect(warnSpy).toHaveBeenCalledWith(
      "[no-trace] 400 Body cannot be empty when content-type is set to 'application/json'",
    );
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should keep an unsupported media type at 415', () => {
    const error = Object.assign(new Error('Unsupported Media Type: application/xml'), {
      statusCode: 415,
    });

    expect(filter.resolve(error)).toEqual({
      status: 415,
      body: { detail: 'Unsupported Media Type: application/xml' },
    });
  });

  it('should not trust a 5xx statusCode on an unknown error', () => {
    const error = Object.assign(new Error('upstream internals'), { statusCode: 503 });

    expect(filter.resolve(error)).toEqual({
      status: 500,
      body: { detail: 'Internal server error' },
    });
  });

  it('should flatten non-Error throwables to a 500', () => {
    expect(filter.resolve('just a string')).toEqual({
      status: 500,
      body: { detail: 'Internal server error' },
    });
  });

  it('should label logs with the current trace_id', () => {
    const traceService = new TraceService();
    const traced = new AllExceptionsFilter(new HttpAdapterHost(), traceService);

    traceService.run('trace-abc', () => traced.resolve(new Error('kaput')));

    expect(errorSpy).toHaveBeenCalledWith('[trace-abc] Unhandled error: kaput', expect.any(String));
  });
});
