import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { FaultKind } from '@nextgen/shared';
import { failed, fault, succeeded } from '../common/errors/fault';
import { LlmService } from './llm.service';
import { LLM_PROVIDER } from './llm-provider';

describe('LlmService', () => {
  let service: LlmService;

  const mockProvider = {
    complete: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [LlmService, { provide: LLM_PROVIDER, useValue: mockProvider }],
    }).compile();

    service = module.get<LlmService>(LlmService);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
  });

  it('should forward the task name and payload to the provider', async () => {
    mockProvider.complete.mockResolvedValue(succeeded({ result: 'done' }));

    const outcome = await service.processTask({
      task_name: 'summarize',
      payload: { text: 'hello world' },
    });

    expect(outcome).toEqual({ ok: true, value: { result: 'done' } });
    expect(mockProvider.complete).toHaveBeenCalledWith('summarize', { text: 'hello world' });
  });

  it('should pass provider faults through unchanged', async () => {
    const networkFault = fault(FaultKind.NETWORK, 'LLM provider is unreachable: ECONNRESET');
    mockProvider.complete.mockResolvedValue(failed(networkFault));

    const outcome = await service.processTask({ task_name: 'summarize', payload: {} });

    expect(outcome).toEqual({ ok: false, fault: networkFault });
  });

  it('should wrap anything the provider throws into a Generic fault', async () => {
    mockProvider.complete.mockRejectedValue(new Error('socket hang up'));

    const outcome = await service.processTask({ task_name: 'summarize', payload: {} });

    expect(outcome).toEqual({
      ok: false,
      fault: { kind: FaultKind.GENERIC, detail: 'socket hang up' },
    });
    expect(Logger.prototype.error).not.toHaveBeenCalled();
  });

  it('should refuse a blank task name without calling the provider', async () => {
    const outcome = await service.processTask({ task_name: '   ', payload: {} });

    expect(outcome).toEqual({
      ok: false,
      fault: { kind: FaultKind.INVALID_PAYLOAD, detail: 'task_name should not be empty' },
    });
    expect(mockProvider.complete).not.toHaveBeenCalled();
  });
});
