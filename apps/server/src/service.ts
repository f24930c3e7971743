// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { z } from 'zod';
import {
  EventKindSchema,
  NotFoundError,
  PermissionError,
  createLogger,
  formatTimestamp,
  now,
  type Session,
} from '@coach/shared';
import type { LanguageModel } from '@coach/providers';
import { withStoreRetry, type Repositories } from '@coach/storage';
import { TokenAuthenticator } from './auth.js';
import type { ServerConfig } from './config.js';
import { RecordService } from './events/record-service.js';
import { parseBody, parseWith, safeDecodeURIComponent, sendError, sendJson } from './http.js';
import { CoachPipeline } from './pipeline/coach-pipeline.js';
import { TokenBucketLimiter } from './rate-limit.js';
import { streamEnvelopes } from './sse/transport.js';
import {
  ExecuteToolRequestSchema,
  ListToolRunsQuerySchema,
  ReportToolResultRequestSchema,
  ToolService,
} from './tools/tool-service.js';

const log = createLogger('server');

const StreamRequestSchema = z.object({
  message: z.string().trim().min(1).max(8000),
});

const CreateSessionRequestSchema = z.object({
  coach_id: z.string().min(1).optional(),
  title: z.string().max(200).optional(),
});

export type CoachServerConfig = Pick<
  ServerConfig,
  | 'host'
  | 'port'
  | 'apiTokens'
  | 'rateLimitPerMinute'
  | 'toolRateLimitPerHour'
  | 'streamKeepAliveMs'
  | 'streamTimeoutMs'
  | 'gemini'
>;

export interface CoachServerOptions {
  config: CoachServerConfig;
  repos: Repositories;
  model: LanguageModel;
  clock?: () => number;
}

function routeParam(pathname: string, pattern: RegExp): string | null {
  const value = pattern.exec(pathname)?.[1];
  return value === undefined ? null : safeDecodeURIComponent(value);
}

function sessionJson(session: Session) {
  return {
    id: session.id,
    coach_id: session.coachId,
    title: session.title,
    created_at: formatTimestamp(session.createdAt),
    updated_at: formatTimestamp(session.updatedAt),
  };
}

// ============================================================================
// Coach Server
// ============================================================================

export class CoachServer {
  private config: CoachServerConfig;
  private repos: Repositories;
  private authenticator: TokenAuthenticator;
  private requestLimiter: TokenBucketLimiter;
  private pipeline: CoachPipeline;
  private tools: ToolService;
  private records: RecordService;
  private server: Server | null = null;
  private baseUrl: string | null = null;

  constructor(options: CoachServerOptions) {
    const clock = options.clock ?? now;
    this.config = options.config;
    this.repos = options.repos;
    this.authenticator = new TokenAuthenticator(options.config.apiTokens);
    this.requestLimiter = new TokenBucketLimiter({
      capacity: options.config.rateLimitPerMinute,
      windowMs: 60_000,
      clock,
    });
    this.pipeline = new CoachPipeline({
      repos: options.repos,
      model: options.model,
      maxOutputTokens: options.config.gemini.maxOutputTokens,
      temperature: options.config.gemini.temperature,
    });
    this.tools = new ToolService({
      repos: options.repos,
      toolLimiter: new TokenBucketLimiter({
        capacity: options.config.toolRateLimitPerHour,
        windowMs: 60 * 60_000,
        clock,
      }),
      clock,
    });
    this.records = new RecordService(options.repos);
  }

  /**
   * Listen on the configured address. Resolves with the base URL, which
   * carries the real port when the configured one is 0.
   */
  async start(): Promise<string> {
    if (this.server && this.baseUrl) return this.baseUrl;

    const server = createServer((request, response) => {
      void this.handleHttpRequest(request, response);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const handleError = (error: Error): void => {
        server.off('listening', handleListening);
        reject(error);
      };
      const handleListening = (): void => {
        server.off('error', handleError);
        resolve();
      };
      server.once('error', handleError);
      server.once('listening', handleListening);
      server.listen(this.config.port, this.config.host);
    });

    const address = server.address();
    const port = address && typeof address === 'object' ? address.port : this.config.port;
    this.baseUrl = `http://${this.config.host}:${port}`;
    log.info('Listening', { url: this.baseUrl });
    return this.baseUrl;
  }

  async stop(): Promise<void> {
    const current = this.server;
    this.server = null;
    this.baseUrl = null;
    if (!current) return;

    await new Promise<void>((resolve, reject) => {
      current.close((error) => (error ? reject(error) : resolve()));
      // Open event streams would otherwise hold close() until their deadline.
      current.closeAllConnections();
    });
  }

  private async handleHttpRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    try {
      const method = (request.method || 'GET').toUpperCase();
      const url = new URL(request.url || '/', 'http://127.0.0.1');
      const pathname = url.pathname.replace(/\/+$/, '') || '/';

      if (method === 'GET' && pathname === '/health') {
        sendJson(response, 200, { ok: true, timestamp: formatTimestamp(now()) });
        return;
      }

      const uid = this.authenticator.authenticate(request);
      this.requestLimiter.consume(uid, 'requests');

      if (method === 'POST' && pathname === '/v1/sessions') {
        await this.handleCreateSession(request, response, uid);
        return;
      }

      const streamSessionId = routeParam(pathname, /^\/v1\/sessions\/([^/]+)\/stream$/);
      if (method === 'POST' && streamSessionId !== null) {
        await this.handleStream(request, response, uid, streamSessionId);
        return;
      }

      if (method === 'POST' && pathname === '/v1/tools/execute') {
        const body = await parseBody(request, ExecuteToolRequestSchema);
        sendJson(response, 200, await this.tools.execute(uid, body));
        return;
      }

      if (method === 'POST' && pathname === '/v1/tools/result') {
        const body = await parseBody(request, ReportToolResultRequestSchema);
        sendJson(response, 200, await this.tools.report(uid, body));
        return;
      }

      if (method === 'GET' && pathname === '/v1/tools/runs') {
        const query = parseWith(ListToolRunsQuerySchema, Object.fromEntries(url.searchParams), 'query');
        sendJson(response, 200, { runs: await this.tools.listRuns(uid, query) });
        return;
      }

      const reminderId = routeParam(pathname, /^\/v1\/events\/reminders\/([^/]+)\/complete$/);
      if (method === 'PUT' && reminderId !== null) {
        sendJson(response, 200, { record: await this.records.completeReminder(uid, reminderId) });
        return;
      }

      const notificationId = routeParam(pathname, /^\/v1\/events\/notifications\/([^/]+)$/);
      if (method === 'DELETE' && notificationId !== null) {
        sendJson(response, 200, { record: await this.records.cancelNotification(uid, notificationId) });
        return;
      }

      const kindParam = routeParam(pathname, /^\/v1\/events\/([^/]+)$/);
      const kind = kindParam === null ? null : EventKindSchema.safeParse(kindParam);
      if (kind?.success && method === 'GET') {
        const records = await this.records.list(uid, kind.data, Object.fromEntries(url.searchParams));
        sendJson(response, 200, { records });
        return;
      }
      if (kind?.success && method === 'POST') {
        const body = await parseBody(request, z.unknown());
        sendJson(response, 200, { record: await this.records.write(uid, kind.data, body) });
        return;
      }

      sendJson(response, 404, { error: { code: 'NOT_FOUND', message: 'Route not found' } });
    } catch (error) {
      sendError(response, error);
    }
  }

  private async handleCreateSession(request: IncomingMessage, response: ServerResponse, uid: string): Promise<void> {
    const body = await parseBody(request, CreateSessionRequestSchema);
    const coachId = body.coach_id;

    const session = await withStoreRetry(
      () => {
        if (coachId !== undefined) {
          const coach = this.repos.coaches.findById(coachId);
          if (!coach) throw new NotFoundError('Coach', coachId);
          if (coach.uid !== uid) throw PermissionError.notOwner('coach', coachId);
        }
        this.repos.users.ensure(uid);
        return this.repos.sessions.create({ uid, coachId: coachId ?? null, title: body.title });
      },
      { label: 'create session' },
    );

    sendJson(response, 201, { session: sessionJson(session) });
  }

  /**
   * Ownership is settled with a plain JSON answer before the event stream
   * opens; from then on every outcome is an envelope.
   */
  private async handleStream(
    request: IncomingMessage,
    response: ServerResponse,
    uid: string,
    sessionId: string,
  ): Promise<void> {
    const body = await parseBody(request, StreamRequestSchema);
    const session = await withStoreRetry(() => this.repos.sessions.findById(sessionId), { label: 'load session' });
    if (!session) {
      sendJson(response, 404, { error: { code: 'SESSION_NOT_FOUND', message: 'Session not found' } });
      return;
    }
    if (session.uid !== uid) {
      sendJson(response, 403, { error: { code: 'ACCESS_DENIED', message: 'Access denied' } });
      return;
    }

    const outcome = await streamEnvelopes(
      response,
      (signal) => this.pipeline.run({ uid, session, text: body.message }, signal),
      { keepAliveMs: this.config.streamKeepAliveMs, timeoutMs: this.config.streamTimeoutMs },
    );
    log.info('Stream finished', { sessionId, outcome });
  }
}
