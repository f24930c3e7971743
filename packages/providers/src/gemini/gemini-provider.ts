// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  GoogleGenerativeAI,
  type Content,
  type GenerateContentRequest,
  type GenerativeModel,
} from '@google/generative-ai';
import {
  type CoachError,
  NetworkError,
  ProviderError,
  isCoachError,
  sanitizeProviderErrorMessage,
} from '@coach/shared';
import type { LanguageModel, ModelRequest, ProviderConfig } from '../types.js';

type GeminiErrorCategory =
  | 'authentication'
  | 'rate_limit'
  | 'quota_exceeded'
  | 'model_not_found'
  | 'network_timeout'
  | 'network_error'
  | 'service_unavailable'
  | 'bad_request'
  | 'unknown';

export interface GeminiErrorTaxonomy {
  category: GeminiErrorCategory;
  message: string;
  statusCode?: number;
  retryable: boolean;
}

// ============================================================================
// Gemini Provider
// ============================================================================

export class GeminiProvider implements LanguageModel {
  readonly id: string;

  private client: GoogleGenerativeAI;
  private config: ProviderConfig;

  constructor(config: ProviderConfig) {
    this.config = config;
    this.id = `google/${config.model}`;
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: ModelRequest, signal?: AbortSignal): Promise<string> {
    const model = this.getGenerativeModel(request);

    try {
      const result = await model.generateContent(this.buildRequest(request), { signal });
      return result.response.text();
    } catch (error) {
      throw this.handleError(error);
    }
  }

  async *stream(request: ModelRequest, signal?: AbortSignal): AsyncGenerator<string> {
    const model = this.getGenerativeModel(request);

    const result = await model
      .generateContentStream(this.buildRequest(request), { signal })
      .catch((error: unknown) => {
        throw this.handleError(error);
      });

    try {
      for await (const chunk of result.stream) {
        const text = chunk.text();
        if (text) {
          yield text;
        }
      }
    } catch (error) {
      throw this.handleError(error);
    }
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private getGenerativeModel(request: ModelRequest): GenerativeModel {
    return this.client.getGenerativeModel({
      model: this.config.model,
      systemInstruction: request.systemInstruction,
      generationConfig: {
        temperature: request.temperature ?? this.config.temperature,
        maxOutputTokens: request.maxOutputTokens ?? this.config.maxOutputTokens,
        responseMimeType: request.json ? 'application/json' : undefined,
      },
    });
  }

  private buildRequest(request: ModelRequest): GenerateContentRequest {
    const contents: Content[] = request.turns.map((turn) => ({
      role: turn.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: turn.text }],
    }));
    return { contents };
  }

  private handleError(error: unknown): CoachError {
    if (isCoachError(error)) return error;

    const taxonomy = classifyGeminiError(error);
    switch (taxonomy.category) {
      case 'model_not_found':
        return ProviderError.modelNotFound('google', this.config.model);
      case 'rate_limit':
        return ProviderError.rateLimit('google');
      case 'quota_exceeded':
        return new ProviderError(
          'google',
          'API quota exceeded. Please check your usage limits.',
          taxonomy.statusCode ?? 429,
          { category: taxonomy.category },
        );
      case 'network_timeout':
      case 'network_error':
        return NetworkError.connectionFailed(undefined, taxonomy.message);
      default:
        return new ProviderError(
          'google',
          taxonomy.message,
          taxonomy.statusCode ?? 500,
          { category: taxonomy.category },
          taxonomy.retryable,
        );
    }
  }
}

// ============================================================================
// Error Taxonomy
// ============================================================================

function readField(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

function extractErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === 'string') return error;
  const message = readField(error, 'message');
  if (typeof message === 'string') return message;
  const nested = readField(readField(error, 'error'), 'message');
  if (typeof nested === 'string') return nested;
  return String(error);
}

function extractStatusCode(error: unknown): number | undefined {
  const candidates = [
    readField(error, 'status'),
    readField(error, 'statusCode'),
    readField(readField(error, 'response'), 'status'),
    readField(readField(error, 'error'), 'code'),
  ];

  for (const value of candidates) {
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string') {
      const parsed = Number.parseInt(value, 10);
      if (Number.isFinite(parsed)) return parsed;
    }
  }
  return undefined;
}

/**
 * Sorts an SDK failure into a category from its status code and message.
 */
export function classifyGeminiError(error: unknown): GeminiErrorTaxonomy {
  const message =
    sanitizeProviderErrorMessage(extractErrorMessage(error)) || 'Request failed with unknown provider error';
  const lower = message.toLowerCase();
  const statusCode = extractStatusCode(error);

  if (statusCode === 401 || statusCode === 403 || lower.includes('api key') || lower.includes('unauthorized')) {
    return { category: 'authentication', message, statusCode: statusCode ?? 401, retryable: false };
  }

  if ((statusCode === 404 && lower.includes('model')) || (lower.includes('model') && lower.includes('not found'))) {
    return { category: 'model_not_found', message, statusCode: 404, retryable: false };
  }

  if (statusCode === 429 || lower.includes('rate limit') || lower.includes('too many requests')) {
    const isQuota = lower.includes('quota') || lower.includes('resource exhausted');
    return {
      category: isQuota ? 'quota_exceeded' : 'rate_limit',
      message,
      statusCode: statusCode ?? 429,
      retryable: true,
    };
  }

  if (statusCode === 408 || lower.includes('timeout') || lower.includes('timed out') || lower.includes('deadline exceeded')) {
    return { category: 'network_timeout', message, statusCode: statusCode ?? 408, retryable: true };
  }

  if (
    lower.includes('network') ||
    lower.includes('failed to fetch') ||
    lower.includes('econnreset') ||
    lower.includes('econnrefused') ||
    lower.includes('enotfound')
  ) {
    return { category: 'network_error', message, statusCode, retryable: true };
  }

  if ((statusCode !== undefined && statusCode >= 500) || lower.includes('service unavailable')) {
    return { category: 'service_unavailable', message, statusCode: statusCode ?? 503, retryable: true };
  }

  if (statusCode !== undefined && statusCode >= 400) {
    return { category: 'bad_request', message, statusCode, retryable: false };
  }

  return { category: 'unknown', message, statusCode, retryable: false };
}
