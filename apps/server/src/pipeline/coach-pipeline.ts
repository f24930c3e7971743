// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  NetworkError,
  ProviderError,
  createLogger,
  errorMessage,
  formatTimestamp,
  now,
  type CoachBlueprint,
  type EnvelopeInit,
  type ErrorPayload,
  type Session,
} from '@coach/shared';
import type { LanguageModel } from '@coach/providers';
import { classifyStorageError, withStoreRetry, type Repositories } from '@coach/storage';
import { buildSystemPrompt, historyTurns, loadCoachContext } from './prompt.js';
import { Planner, type PlannerCard } from './planner.js';
import { RouteClassifier } from './router.js';
import { checkReply } from './safety.js';
import { suggestToolRequests } from './tool-suggestions.js';

const log = createLogger('pipeline');

export const MAX_RENDERED_CARDS = 3;

export interface CoachTurn {
  uid: string;
  session: Session;
  text: string;
}

interface CoachPipelineOptions {
  repos: Repositories;
  model: LanguageModel;
  maxOutputTokens?: number;
  temperature?: number;
}

// ============================================================================
// Coach Pipeline
// ============================================================================

/**
 * Runs one chat turn and yields its envelopes in wire order. The caller owns
 * the signal; once it fires the pipeline stops without yielding further.
 */
export class CoachPipeline {
  private repos: Repositories;
  private model: LanguageModel;
  private classifier: RouteClassifier;
  private planner: Planner;
  private maxOutputTokens?: number;
  private temperature?: number;

  constructor(options: CoachPipelineOptions) {
    this.repos = options.repos;
    this.model = options.model;
    this.classifier = new RouteClassifier(options.model);
    this.planner = new Planner(options.model);
    this.maxOutputTokens = options.maxOutputTokens;
    this.temperature = options.temperature;
  }

  async *run(turn: CoachTurn, signal: AbortSignal): AsyncGenerator<EnvelopeInit> {
    yield {
      type: 'stream.open',
      data: { session_id: turn.session.id, server_time_iso: formatTimestamp(now()) },
    };

    try {
      yield* this.runTurn(turn, signal);
    } catch (error) {
      if (signal.aborted) {
        log.debug('Turn cancelled', { sessionId: turn.session.id });
        return;
      }
      const payload = describeFailure(error);
      log.error('Turn failed', error, { sessionId: turn.session.id, code: payload.code });
      yield { type: 'error', data: payload };
    }
  }

  private async *runTurn(turn: CoachTurn, signal: AbortSignal): AsyncGenerator<EnvelopeInit> {
    const { repos } = this;
    const sessionId = turn.session.id;

    await withStoreRetry(
      () => {
        repos.messages.create({ sessionId, role: 'user', text: turn.text });
        repos.sessions.touch(sessionId);
      },
      { label: 'save user message' },
    );

    const route = await this.classifier.classify(turn.text, signal);
    log.debug('Turn routed', { sessionId, route: route.route, confidence: route.confidence });

    const context = await withStoreRetry(
      () => loadCoachContext(repos, { uid: turn.uid, sessionId, coachId: turn.session.coachId, route: route.route }),
      { label: 'load coach context' },
    );

    // Partial text is only kept in memory until the model finishes.
    let replyText = '';
    const stream = this.model.stream(
      {
        systemInstruction: buildSystemPrompt(context, route.route),
        turns: historyTurns(context.history),
        maxOutputTokens: this.maxOutputTokens,
        temperature: this.temperature,
      },
      signal,
    );
    for await (const delta of stream) {
      if (delta.length === 0) continue;
      replyText += delta;
      yield { type: 'message.delta', data: { role: 'assistant', delta } };
    }
    signal.throwIfAborted();

    const assistant = await withStoreRetry(
      () => {
        const message = repos.messages.create({ sessionId, role: 'assistant', text: replyText });
        repos.sessions.touch(sessionId);
        return message;
      },
      { label: 'save assistant message' },
    );

    yield {
      type: 'message.final',
      data: {
        message_id: assistant.id,
        role: 'assistant',
        text: replyText,
        render_hints: { max_cards: MAX_RENDERED_CARDS },
      },
    };

    const requests = suggestToolRequests({
      replyText,
      userText: turn.text,
      blueprint: context.blueprint,
      route: route.route,
    });
    signal.throwIfAborted();
    for (const request of requests) {
      yield { type: 'tool.request', data: request };
      yield { type: 'tool.status', data: { request_id: request.request_id, status: 'awaiting_client' } };
    }

    signal.throwIfAborted();
    if (route.needsPlanner) {
      yield* this.plannerCards(replyText, context.blueprint, signal);
    }

    for (const finding of checkReply(replyText, context.blueprint)) {
      yield { type: 'policy.notice', data: { kind: 'safety_boundary', message: finding.message } };
    }

    signal.throwIfAborted();
    yield { type: 'stream.done', data: { status: 'ok' } };
  }

  private async *plannerCards(
    replyText: string,
    blueprint: CoachBlueprint,
    signal: AbortSignal,
  ): AsyncGenerator<EnvelopeInit> {
    let cards: PlannerCard[] | null;
    try {
      cards = await this.planner.extract(replyText, blueprint, signal);
    } catch (error) {
      if (signal.aborted) throw error;
      log.warn('Planner failed', { reason: errorMessage(error) });
      cards = null;
    }

    if (cards === null) {
      yield { type: 'policy.notice', data: { kind: 'planner_warning', message: 'Could not extract structured plan' } };
      return;
    }
    yield* cards;
  }
}

function describeFailure(error: unknown): ErrorPayload {
  if (classifyStorageError(error) !== null) {
    return { code: 'PERSISTENCE_ERROR', message: 'Failed to save the conversation' };
  }
  if (error instanceof ProviderError || error instanceof NetworkError) {
    return { code: 'COACH_ERROR', message: 'Failed to generate response' };
  }
  return { code: 'PIPELINE_ERROR', message: 'Pipeline failed' };
}
