import { HttpException } from '@nestjs/common';
import { FAULT_STATUS, FaultKind, TaskResultDto } from '@nextgen/shared';

/**
 * A classified failure: one fault kind plus a human-readable detail.
 */
export interface Fault {
  readonly kind: FaultKind;
  readonly detail: string;
}

/**
 * Result of running a task: either the provider's result or exactly one fault.
 */
export type TaskOutcome =
  | { readonly ok: true; readonly value: TaskResultDto }
  | { readonly ok: false; readonly fault: Fault };

export function fault(kind: FaultKind, detail: string): Fault {
  return Object.freeze({ kind, detail });
}

export function succeeded(value: TaskResultDto): TaskOutcome {
  return { ok: true, value };
}

export function failed(reason: Fault): TaskOutcome {
  return { ok: false, fault: reason };
}

export function faultStatus(kind: FaultKind): number {
  return FAULT_STATUS[kind];
}

/**
 * Best-effort message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * HttpException carrying a Fault, rendered by AllExceptionsFilter as
 * { detail } with the status bound to the fault kind.
 */
export class FaultException extends HttpException {
  constructor(readonly fault: Fault) {
    super({ detail: fault.detail }, faultStatus(fault.kind));
  }
}
