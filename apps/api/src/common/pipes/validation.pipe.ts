import { Logger, ValidationError, ValidationPipe } from '@nestjs/common';
import { FaultKind } from '@nextgen/shared';
import { fault, FaultException } from '../errors/fault';

const logger = new Logger('ValidationPipe');

/**
 * Flatten class-validator errors (including nested children) into their
 * constraint messages, in declaration order.
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    messages.push(...Object.values(error.constraints ?? {}));
    if (error.children && error.children.length > 0) {
      messages.push(...formatValidationErrors(error.children));
    }
  }
  return messages;
}

/**
 * Build the InvalidPayload fault raised for a request body that fails validation.
 */
export function invalidPayloadException(errors: ValidationError[]): FaultException {
  const messages = formatValidationErrors(errors);
  const detail = messages.length > 0 ? messages.join('; ') : 'Invalid request payload';

  logger.warn(`Validation error: ${detail}`);
  return new FaultException(fault(FaultKind.INVALID_PAYLOAD, detail));
}

/**
 * Global validation pipe: whitelist request DTOs, reject unknown fields and
 * report failures as InvalidPayload faults.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: invalidPayloadException,
  });
}
