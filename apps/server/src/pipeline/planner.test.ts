import { describe, expect, it } from 'vitest';
import { parsePlannerOutput } from './planner.js';

describe('parsePlannerOutput', () => {
  it('clips plan lists and standalone actions', () => {
    const cards = parsePlannerOutput(
      JSON.stringify({
        plan: {
          title: 'Launch',
          objective: 'Ship the beta',
          horizon: 'quarter',
          milestones: Array.from({ length: 9 }, (_, i) => ({ title: `M${i}` })),
          next_actions: Array.from({ length: 13 }, (_, i) => ({ title: `A${i}` })),
        },
        next_actions: Array.from({ length: 9 }, (_, i) => ({ title: `N${i}`, duration_min: 15 })),
        weekly_review: null,
      }),
    );

    expect(cards?.map((card) => card.type)).toEqual(['card.plan', 'card.next_actions']);
    const [plan, actions] = cards ?? [];
    expect(plan.type === 'card.plan' && plan.data.plan.milestones.length).toBe(8);
    expect(plan.type === 'card.plan' && plan.data.plan.next_actions.length).toBe(12);
    expect(actions.type === 'card.next_actions' && actions.data.items.map((item) => item.id)).toEqual([
      'na_1',
      'na_2',
      'na_3',
      'na_4',
      'na_5',
      'na_6',
      'na_7',
    ]);
  });

  it('emits a weekly review card with defaulted lists', () => {
    expect(parsePlannerOutput('{"weekly_review":{"wins":["Ran twice"]}}')).toEqual([
      {
        type: 'card.weekly_review',
        data: {
          schema: 'WeeklyReview.v1',
          review: { wins: ['Ran twice'], misses: [], lessons: [], next_week_focus: [] },
        },
      },
    ]);
  });

  it('returns no cards when nothing was proposed', () => {
    expect(parsePlannerOutput('{"plan":null,"next_actions":[],"weekly_review":null}')).toEqual([]);
  });

  it('rejects output that does not parse', () => {
    expect(parsePlannerOutput('{"plan":{"title":"x","horizon":"decade"}}')).toBeNull();
    expect(parsePlannerOutput('no json here')).toBeNull();
  });
});
