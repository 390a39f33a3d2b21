import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { INFERENCE_CAPABILITY } from './inference.constants';
import { OpenAiInferenceService } from './openai-inference.service';

@Module({
  imports: [ConfigModule],
  providers: [
    { provide: INFERENCE_CAPABILITY, useClass: OpenAiInferenceService },
  ],
  exports: [INFERENCE_CAPABILITY],
})
export class InferenceModule {}
