import { Module } from '@nestjs/common';
import { LlmService } from './llm.service';
import { LLM_PROVIDER } from './llm-provider';
import { OpenAiChatProvider } from './openai-chat.provider';

/**
 * LLM Module
 *
 * Provides the task processor (LlmService) and binds the LLM_PROVIDER token to
 * the OpenAI-compatible provider. Tests override LLM_PROVIDER with a stub.
 */
@Module({
  providers: [LlmService, { provide: LLM_PROVIDER, useClass: OpenAiChatProvider }],
  exports: [LlmService],
})
export class LlmModule {}
