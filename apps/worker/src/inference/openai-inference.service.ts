import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import {
  InferenceCapability,
  InferenceContext,
  InferenceError,
  InferenceResult,
} from '@sheetwise/pipeline';
import { WORKER_SETTINGS, WorkerSettings } from '../config/worker-settings';
import {
  buildExtractionMessages,
  parseInferenceReply,
} from './extraction-prompt';

/**
 * OpenAiInferenceService — InferenceCapability backed by the chat
 * completions API in JSON mode.
 *
 * The SDK's own retries are disabled: SheetExtractor owns retry and
 * backoff, so every failure is reported once, classified as an
 * InferenceError when it is worth retrying.
 */
@Injectable()
export class OpenAiInferenceService implements InferenceCapability {
  private readonly logger = new Logger(OpenAiInferenceService.name);
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(
    configService: ConfigService,
    @Inject(WORKER_SETTINGS) settings: WorkerSettings,
  ) {
    const apiKey = configService.get<string>('OPENAI_API_KEY', '');
    if (!apiKey) {
      this.logger.warn('OPENAI_API_KEY is not set; every extraction will fail');
    }

    this.model = configService.get<string>('OPENAI_MODEL', 'gpt-4o-mini');
    const callTimeoutMs = settings.extraction.callTimeoutMs;
    this.client = new OpenAI({
      apiKey,
      maxRetries: 0,
      ...(callTimeoutMs > 0 ? { timeout: callTimeoutMs } : {}),
    });
  }

  async infer(context: InferenceContext): Promise<InferenceResult> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: buildExtractionMessages(context),
      });

      const reply = completion.choices[0]?.message.content;
      const result = parseInferenceReply(reply);
      const fields = Object.keys(result.payload).length;
      this.logger.debug(
        `Sheet "${context.unitName}" of ${context.filename}: ` +
          `${fields} field(s), confidence ${result.confidence}`,
      );
      return result;
    } catch (error) {
      throw toInferenceError(error);
    }
  }
}

/**
 * Retryable API failures become InferenceError; authentication, bad
 * requests and programming errors are returned unchanged and fail the job.
 */
export function toInferenceError(error: unknown): Error {
  if (error instanceof InferenceError) return error;

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new InferenceError('timeout', error.message, { cause: error });
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new InferenceError('rate_limited', error.message, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new InferenceError('unavailable', error.message, { cause: error });
  }
  if (
    error instanceof OpenAI.APIError &&
    error.status !== undefined &&
    error.status >= 500
  ) {
    return new InferenceError('unavailable', error.message, { cause: error });
  }

  return error instanceof Error ? error : new Error(String(error));
}
