// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// ============================================================================
// Language Model Port
// ============================================================================

export type ModelTurnRole = 'user' | 'assistant';

export interface ModelTurn {
  role: ModelTurnRole;
  text: string;
}

export interface ModelRequest {
  systemInstruction?: string;
  /** Conversation in order, ending with the turn to answer. */
  turns: ModelTurn[];
  /** Ask for a single JSON document instead of prose. */
  json?: boolean;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * The narrow surface the coaching pipeline needs from a model vendor.
 */
export interface LanguageModel {
  readonly id: string;
  complete(request: ModelRequest, signal?: AbortSignal): Promise<string>;
  stream(request: ModelRequest, signal?: AbortSignal): AsyncIterable<string>;
}

export interface ProviderConfig {
  apiKey: string;
  model: string;
  maxOutputTokens?: number;
  temperature?: number;
}
