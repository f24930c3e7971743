// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import {
  ConflictError,
  JsonObjectSchema,
  NotFoundError,
  PermissionError,
  TerminalToolRunStatusSchema,
  ToolRunStatusSchema,
  createLogger,
  formatTimestamp,
  generateExecutionToken,
  getToolDefinition,
  isCoachError,
  isServerToolId,
  isTerminalToolRunStatus,
  validateToolInput,
  type JsonObject,
  type ToolDefinition,
  type ToolRun,
} from '@coach/shared';
import { classifyStorageError, withStoreRetry, type Repositories } from '@coach/storage';
import { secretsEqual } from '../auth.js';
import type { TokenBucketLimiter } from '../rate-limit.js';
import { SERVER_TOOLS } from './server-tools.js';

const log = createLogger('tools');

// ============================================================================
// Wire Shapes
// ============================================================================

export const ExecuteToolRequestSchema = z.object({
  tool_id: z.string().min(1),
  session_id: z.string().min(1).optional(),
  input: z.unknown(),
});

export type ExecuteToolRequest = z.infer<typeof ExecuteToolRequestSchema>;

export const ReportToolResultRequestSchema = z.object({
  tool_run_id: z.string().min(1),
  execution_token: z.string().min(1),
  status: TerminalToolRunStatusSchema,
  output: JsonObjectSchema.optional(),
  error: z.string().max(2000).optional(),
});

export type ReportToolResultRequest = z.infer<typeof ReportToolResultRequestSchema>;

export const ListToolRunsQuerySchema = z.object({
  status: ToolRunStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export interface ExecuteToolResponse {
  tool_run_id: string;
  status: ToolRun['status'];
  execution_token?: string;
  output?: JsonObject;
  error?: string;
}

/** A run as listed to its owner. The execution token is never included. */
export interface ToolRunSummary {
  tool_run_id: string;
  tool_id: string;
  session_id: string | null;
  status: ToolRun['status'];
  input: JsonObject;
  output: JsonObject | null;
  error: string | null;
  created_at: string;
  updated_at: string;
}

function summarize(run: ToolRun): ToolRunSummary {
  return {
    tool_run_id: run.id,
    tool_id: run.toolId,
    session_id: run.sessionId,
    status: run.status,
    input: run.input,
    output: run.output,
    error: run.error,
    created_at: formatTimestamp(run.createdAt),
    updated_at: formatTimestamp(run.updatedAt),
  };
}

// ============================================================================
// Tool Service
// ============================================================================

interface ToolServiceOptions {
  repos: Repositories;
  /** Keyed per (uid, tool). */
  toolLimiter: TokenBucketLimiter;
  clock: () => number;
}

export class ToolService {
  private repos: Repositories;
  private toolLimiter: TokenBucketLimiter;
  private clock: () => number;

  constructor(options: ToolServiceOptions) {
    this.repos = options.repos;
    this.toolLimiter = options.toolLimiter;
    this.clock = options.clock;
  }

  /**
   * Request transition. Checks run in a fixed order: tool exists, input,
   * entitlement, session ownership, rate limit. A refused request never
   * spends a rate-limit slot. The tool's owner then decides
   * whether the run completes here or waits for the device.
   */
  async execute(uid: string, request: ExecuteToolRequest): Promise<ExecuteToolResponse> {
    const tool = getToolDefinition(request.tool_id);
    if (!tool) throw new NotFoundError('Tool', request.tool_id);

    const input = validateToolInput(tool, request.input);

    if (tool.entitlement) {
      const entitlement = tool.entitlement;
      const entitled = await withStoreRetry(() => this.repos.users.hasEntitlement(uid, entitlement), {
        label: 'check entitlement',
      });
      if (!entitled) throw PermissionError.missingEntitlement(entitlement, tool.id);
    }

    const sessionId = request.session_id ?? null;
    if (sessionId) await this.assertSessionOwner(uid, sessionId);

    this.toolLimiter.consume(`${uid}:${tool.id}`, `tool ${tool.id}`);

    switch (tool.owner) {
      case 'server':
        return this.runOnServer(uid, tool, input, sessionId);
      case 'client':
        return this.handOffToClient(uid, tool, input, sessionId);
    }
  }

  /**
   * Report transition. Only the run's owner may report, exactly once, with
   * the token handed out at execute.
   */
  async report(uid: string, request: ReportToolResultRequest): Promise<{ status: 'updated' }> {
    const runId = request.tool_run_id;
    const run = await withStoreRetry(() => this.repos.toolRuns.findById(runId), { label: 'load tool run' });

    if (!run) throw new NotFoundError('Tool run', runId);
    if (run.uid !== uid) throw PermissionError.notOwner('tool run', runId);
    if (isTerminalToolRunStatus(run.status)) throw ConflictError.alreadyTerminal(runId, run.status);
    if (!run.executionToken || !secretsEqual(run.executionToken, request.execution_token)) {
      throw PermissionError.invalidExecutionToken(runId);
    }

    const updated = await withStoreRetry(
      () =>
        this.repos.toolRuns.completePending(runId, {
          status: request.status,
          output: request.output ?? null,
          error: request.error ?? null,
        }),
      { label: 'complete tool run' },
    );
    // Lost a race with another report for the same run.
    if (!updated) throw ConflictError.alreadyTerminal(runId, 'completed');

    log.info('Tool run reported', { runId, toolId: run.toolId, status: request.status });
    return { status: 'updated' };
  }

  async listRuns(uid: string, query: z.infer<typeof ListToolRunsQuerySchema>): Promise<ToolRunSummary[]> {
    const runs = await withStoreRetry(
      () => this.repos.toolRuns.listByUid(uid, { status: query.status, limit: query.limit }),
      { label: 'list tool runs' },
    );
    return runs.map(summarize);
  }

  private async assertSessionOwner(uid: string, sessionId: string): Promise<void> {
    const session = await withStoreRetry(() => this.repos.sessions.findById(sessionId), { label: 'load session' });
    if (!session) throw new NotFoundError('Session', sessionId);
    if (session.uid !== uid) throw PermissionError.notOwner('session', sessionId);
  }

  private async runOnServer(
    uid: string,
    tool: ToolDefinition,
    input: JsonObject,
    sessionId: string | null,
  ): Promise<ExecuteToolResponse> {
    if (!isServerToolId(tool.id)) throw new NotFoundError('Tool', tool.id);
    const handler = SERVER_TOOLS[tool.id];

    // The tool's own writes and the run record commit together.
    const run = await withStoreRetry(
      () =>
        this.repos.db.transaction(() => {
          let output: JsonObject | null = null;
          let error: string | null = null;
          try {
            output = handler.execute(input, { uid, repos: this.repos, clock: this.clock });
          } catch (failure) {
            if (classifyStorageError(failure) !== null || !isCoachError(failure)) throw failure;
            error = failure.message;
          }
          return this.repos.toolRuns.create({
            uid,
            toolId: tool.id,
            sessionId,
            input,
            status: error === null ? 'executed' : 'failed',
            output,
            error,
          });
        }),
      { label: `run ${tool.id}` },
    );

    log.info('Server tool ran', { runId: run.id, toolId: tool.id, status: run.status });
    return {
      tool_run_id: run.id,
      status: run.status,
      ...(run.output ? { output: run.output } : {}),
      ...(run.error ? { error: run.error } : {}),
    };
  }

  private async handOffToClient(
    uid: string,
    tool: ToolDefinition,
    input: JsonObject,
    sessionId: string | null,
  ): Promise<ExecuteToolResponse> {
    const token = generateExecutionToken();
    const run = await withStoreRetry(
      () =>
        this.repos.toolRuns.create({
          uid,
          toolId: tool.id,
          sessionId,
          input,
          status: 'pending',
          executionToken: token,
        }),
      { label: 'create pending run' },
    );

    log.info('Client tool pending', { runId: run.id, toolId: tool.id });
    return { tool_run_id: run.id, status: 'pending', execution_token: token };
  }
}
