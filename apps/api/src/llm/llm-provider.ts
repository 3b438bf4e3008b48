import { JsonObject } from '@nextgen/shared';
import { TaskOutcome } from '../common/errors/fault';

export const LLM_PROVIDER = Symbol('LLM_PROVIDER');

/**
 * Remote LLM backend.
 *
 * Implementations classify their own transport and application failures into
 * Network, LLMProvider and Timeout faults. Anything they throw instead is
 * treated as a Generic fault by LlmService.
 */
export interface LlmProvider {
  complete(taskName: string, payload: JsonObject): Promise<TaskOutcome>;
}
