import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
} from '@nestjs/common';
import {
  CapabilitiesResponseDto,
  FaultKind,
  HeartbeatResponseDto,
  IndexResponseDto,
  TaskResultDto,
} from '@nextgen/shared';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { describeError, Fault, fault, FaultException } from '../common/errors/fault';
import { LlmService } from '../llm/llm.service';
import { GenerateTaskDto } from './dto/generate-task.dto';

export const INDEX_MESSAGE = 'NextGen API is live!';

/**
 * NextGen Controller
 *
 * Mounted under the global prefix (api/nextgen):
 * - GET  /             liveness message
 * - GET  /capabilities models this deployment advertises
 * - POST /heartbeat    backend heartbeat
 * - POST /generate     run a task through the LLM provider
 *
 * Faults are thrown as FaultException and rendered by AllExceptionsFilter.
 */
@Controller()
export class NextGenController {
  private readonly logger = new Logger(NextGenController.name);

  constructor(
    private readonly llmService: LlmService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  @Get()
  index(): IndexResponseDto {
    this.logger.log(INDEX_MESSAGE);
    return { message: INDEX_MESSAGE };
  }

  @Get('capabilities')
  getCapabilities(): CapabilitiesResponseDto {
    return this.guarded('Error in /capabilities', () => {
      this.logger.log('Fetching capabilities');
      return { models: [...this.config.capabilities] };
    });
  }

  @Post('heartbeat')
  @HttpCode(HttpStatus.OK)
  heartbeat(): HeartbeatResponseDto {
    return this.guarded('Error in /heartbeat', () => {
      this.logger.log('Heartbeat check');
      return { info: 'heartbeat OK', role: 'backend' };
    });
  }

  /**
   * POST /generate
   *
   * The body is validated by the global ValidationPipe before this runs, so
   * schema failures surface as InvalidPayload ahead of any provider fault.
   */
  @Post('generate')
  @HttpCode(HttpStatus.OK)
  async generate(@Body() body: GenerateTaskDto): Promise<TaskResultDto> {
    this.logger.log(`Received task: ${body.task_name}`);

    const outcome = await this.llmService.processTask(body);
    if (outcome.ok) {
      return outcome.value;
    }

    const reason = outcome.fault;
    if (reason.kind === FaultKind.GENERIC) {
      throw this.surface(fault(FaultKind.GENERIC, `Unhandled error in /generate: ${reason.detail}`));
    }
    throw this.surface(reason);
  }

  /**
   * Run a handler body, turning anything it throws into a Generic fault.
   */
  private guarded<T>(label: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw this.surface(fault(FaultKind.GENERIC, `${label}: ${describeError(error)}`));
    }
  }

  /**
   * Log a fault at the level its kind calls for and wrap it for the filter.
   */
  private surface(reason: Fault): FaultException {
    switch (reason.kind) {
      case FaultKind.INVALID_PAYLOAD:
        this.logger.warn(`Invalid payload: ${reason.detail}`);
        break;
      case FaultKind.NOT_FOUND:
        this.logger.warn(`Not found: ${reason.detail}`);
        break;
      case FaultKind.NETWORK:
        this.logger.error(`Network error: ${reason.detail}`);
        break;
      case FaultKind.LLM_PROVIDER:
        this.logger.error(`LLM provider error: ${reason.detail}`);
        break;
      case FaultKind.TIMEOUT:
        this.logger.error(`Timeout error: ${reason.detail}`);
        break;
      case FaultKind.GENERIC:
        // logged once by AllExceptionsFilter, with the trace id
        break;
      default: {
        const unreachable: never = reason.kind;
        throw new Error(`Unknown fault kind: ${String(unreachable)}`);
      }
    }
    return new FaultException(reason);
  }
}
