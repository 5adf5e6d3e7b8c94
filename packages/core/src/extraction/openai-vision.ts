/**
 * OpenAI Vision Extraction Service
 *
 * One chat completion per page: the statement template prompt plus the page
 * image as a data URI. SDK retries are off; rate limits surface as
 * ExtractionTransientError and the orchestrator owns the backoff.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import { ExtractionFatalError, ExtractionTransientError } from '../errors';
import { getTemplateForStatementType, renderUserPrompt } from '../templates';
import type { PageExtraction, PageImage } from '../types';
import type { ExtractionRequest, ExtractionService } from './types';
import { parseExtractionContent } from './normalize';
import { isRetryableError } from './retry';

export interface OpenAiVisionOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
  /** Preconfigured client; apiKey and timeoutMs are ignored when given */
  client?: OpenAI;
}

/**
 * Encode a page image as a data URI. String data is taken as base64 already.
 */
export function toDataUrl(image: PageImage): string {
  if (typeof image.data === 'string') {
    return image.data.startsWith('data:') ? image.data : `data:${image.media_type};base64,${image.data}`;
  }
  return `data:${image.media_type};base64,${image.data.toString('base64')}`;
}

/**
 * Map an SDK or transport error onto the extraction error taxonomy.
 */
export function classifyServiceError(error: unknown): ExtractionTransientError | ExtractionFatalError {
  if (error instanceof ExtractionTransientError || error instanceof ExtractionFatalError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  if (isRetryableError(error)) {
    return new ExtractionTransientError(message, { cause: error, status: 429 });
  }
  return new ExtractionFatalError('service_error', message, { cause: error });
}

export class OpenAiVisionExtractionService implements ExtractionService {
  readonly name = 'openai-vision';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: OpenAiVisionOptions = {}) {
    this.model = options.model ?? config.openaiModel;
    this.maxTokens = options.maxTokens ?? config.openaiMaxTokens;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey ?? config.openaiApiKey,
        timeout: options.timeoutMs ?? config.llmRequestTimeoutMs,
        maxRetries: 0,
      });
  }

  async extract(request: ExtractionRequest): Promise<PageExtraction> {
    const template = getTemplateForStatementType(request.statementTypeHint);
    const userPrompt = renderUserPrompt(template, {
      pageNum: request.pageNum,
      pageText: request.rawText,
    });

    const startTime = Date.now();
    let content: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: template.systemPrompt },
          {
            role: 'user',
            content: [
              { type: 'text', text: userPrompt },
              { type: 'image_url', image_url: { url: toDataUrl(request.image), detail: 'high' } },
            ],
          },
        ],
        response_format: { type: 'json_object' },
        max_tokens: this.maxTokens,
        temperature: 0,
      });

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      content = response.choices[0]?.message?.content;

      logger.debug('OpenAI vision response received', {
        model: this.model,
        request_id: response.id,
        page_num: request.pageNum,
        statement_type: request.statementTypeHint,
        duration_seconds: duration,
        completion_tokens: response.usage?.completion_tokens,
      });
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'error' });

      const classified = classifyServiceError(error);
      logger.warn('OpenAI vision request failed', {
        model: this.model,
        page_num: request.pageNum,
        retryable: classified.retryable,
        error: classified.message,
      });
      throw classified;
    }

    return parseExtractionContent(content);
  }
}
