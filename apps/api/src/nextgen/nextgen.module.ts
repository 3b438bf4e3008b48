import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { NextGenController } from './nextgen.controller';

@Module({
  imports: [LlmModule],
  controllers: [NextGenController],
})
export class NextGenModule {}
