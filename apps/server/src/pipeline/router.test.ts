import { describe, expect, it } from 'vitest';
import { ProviderError } from '@coach/shared';
import type { LanguageModel } from '@coach/providers';
import { FALLBACK_ROUTE, RouteClassifier, buildClassificationPrompt, parseRouteDecision, routeAllowsTool } from './router.js';

describe('parseRouteDecision', () => {
  it('reads a known route and takes planner need from the route table', () => {
    expect(parseRouteDecision('{"route":"make_a_system","confidence":0.92,"needs_planner":false}')).toEqual({
      route: 'make_a_system',
      confidence: 0.92,
      needsPlanner: true,
    });
  });

  it('accepts fenced JSON', () => {
    expect(parseRouteDecision('```json\n{"route":"scheduling","confidence":0.6}\n```').route).toBe('scheduling');
  });

  it.each(['{"route":"small_talk","confidence":0.9}', 'quick nudge please', '{"confidence":0.9}'])(
    'falls back on %s',
    (reply) => {
      expect(parseRouteDecision(reply)).toEqual(FALLBACK_ROUTE);
    },
  );
});

describe('RouteClassifier', () => {
  it('falls back when the model fails', async () => {
    const model: LanguageModel = {
      id: 'failing',
      complete: async () => {
        throw ProviderError.rateLimit('failing');
      },
      stream: async function* () {
        yield '';
      },
    };

    await expect(new RouteClassifier(model).classify('hello')).resolves.toEqual({
      route: 'quick_nudge',
      confidence: 0.5,
      needsPlanner: false,
    });
  });
});

describe('route table', () => {
  it('lets only scheduling turns propose device tools', () => {
    expect(routeAllowsTool('scheduling', 'reminder_create')).toBe(true);
    expect(routeAllowsTool('deep_session', 'reminder_create')).toBe(false);
    expect(routeAllowsTool('quick_nudge', 'memory_read')).toBe(false);
  });

  it('asks for JSON only', () => {
    const prompt = buildClassificationPrompt();
    expect(prompt.split('\n').at(-1)).toBe(
      'Respond with JSON only: {"route": string, "confidence": number, "needs_planner": boolean}',
    );
    expect(prompt).toContain('- review_retro: review how a past period or plan went.');
  });
});
