// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

export type { LanguageModel, ModelRequest, ModelTurn, ModelTurnRole, ProviderConfig } from './types.js';
export { GeminiProvider, classifyGeminiError, type GeminiErrorTaxonomy } from './gemini/gemini-provider.js';
