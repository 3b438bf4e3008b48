import { Inject, Injectable, Logger } from '@nestjs/common';
import { FaultKind, TaskRequestDto } from '@nextgen/shared';
import { describeError, failed, fault, TaskOutcome } from '../common/errors/fault';
import { LLM_PROVIDER, LlmProvider } from './llm-provider';

/**
 * LlmService
 *
 * Task processor: forwards a validated task request to the LLM provider and
 * returns its outcome. Single best-effort call; no retries.
 *
 * Never rejects. Whatever the provider throws is returned as a Generic fault
 * carrying the original message.
 */
@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);

  constructor(@Inject(LLM_PROVIDER) private readonly provider: LlmProvider) {}

  async processTask(request: TaskRequestDto): Promise<TaskOutcome> {
    if (request.task_name.trim().length === 0) {
      return failed(fault(FaultKind.INVALID_PAYLOAD, 'task_name should not be empty'));
    }

    try {
      const outcome = await this.provider.complete(request.task_name, request.payload);
      if (outcome.ok) {
        this.logger.debug(`Task "${request.task_name}" completed`);
      }
      return outcome;
    } catch (error) {
      return failed(fault(FaultKind.GENERIC, describeError(error)));
    }
  }
}
