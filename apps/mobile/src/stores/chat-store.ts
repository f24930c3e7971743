// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { createStore } from 'zustand/vanilla';
import {
  createLogger,
  errorMessage,
  generateMessageId,
  type Envelope,
  type EnvelopePayloads,
  type ErrorPayload,
  type ToolRequestPayload,
} from '@coach/shared';
import { getCoachClient } from '../lib/client.js';

const log = createLogger('chat');

export interface ChatMessage {
  id: string;
  role: 'user' | 'assistant';
  text: string;
}

export type ChatCard =
  | { type: 'card.next_actions'; data: EnvelopePayloads['card.next_actions'] }
  | { type: 'card.plan'; data: EnvelopePayloads['card.plan'] }
  | { type: 'card.weekly_review'; data: EnvelopePayloads['card.weekly_review'] };

export type ToolRequestStatus = EnvelopePayloads['tool.status']['status'];

interface ChatState {
  sessionId: string | null;
  messages: ChatMessage[];
  streamBuffer: string;
  cards: ChatCard[];
  maxCards: number | null;
  toolRequests: ToolRequestPayload[];
  toolStatuses: Record<string, ToolRequestStatus>;
  notices: EnvelopePayloads['policy.notice'][];
  isStreaming: boolean;
  error: ErrorPayload | null;
}

interface ChatActions {
  /** Send one turn. Resolves when its stream has ended or been stopped. */
  send: (sessionId: string, text: string) => Promise<void>;
  /** Cancel the turn in flight. Does nothing when there is none. */
  stop: () => void;
  applyEnvelope: (envelope: Envelope) => void;
  clearError: () => void;
  reset: () => void;
}

export type ChatStore = ChatState & ChatActions;

const initialState: ChatState = {
  sessionId: null,
  messages: [],
  streamBuffer: '',
  cards: [],
  maxCards: null,
  toolRequests: [],
  toolStatuses: {},
  notices: [],
  isStreaming: false,
  error: null,
};

export function createChatStore() {
  let active: AbortController | null = null;

  return createStore<ChatStore>()((set, get) => ({
    ...initialState,

    send: async (sessionId, text) => {
      get().stop();
      const controller = new AbortController();
      active = controller;

      set((state) => ({
        sessionId,
        messages: [...state.messages, { id: generateMessageId(), role: 'user', text }],
        streamBuffer: '',
        cards: [],
        maxCards: null,
        toolRequests: [],
        toolStatuses: {},
        notices: [],
        isStreaming: true,
        error: null,
      }));

      try {
        for await (const envelope of getCoachClient().streamSession(sessionId, text, controller.signal)) {
          get().applyEnvelope(envelope);
        }
      } catch (error) {
        if (!controller.signal.aborted) {
          log.warn('Stream failed', { sessionId, error: errorMessage(error) });
          set({ error: { code: 'TRANSPORT_ERROR', message: errorMessage(error) } });
        }
      } finally {
        if (active === controller) {
          active = null;
          set({ isStreaming: false });
        }
      }
    },

    stop: () => {
      const controller = active;
      if (!controller) return;
      active = null;
      controller.abort();
      set({ isStreaming: false });
    },

    applyEnvelope: (envelope) => {
      switch (envelope.type) {
        case 'message.delta':
          set((state) => ({ streamBuffer: `${state.streamBuffer}${envelope.data.delta}` }));
          return;
        case 'message.final':
          set((state) => ({
            messages: [...state.messages, { id: envelope.data.message_id, role: 'assistant', text: envelope.data.text }],
            streamBuffer: '',
            maxCards: envelope.data.render_hints.max_cards,
          }));
          return;
        case 'card.next_actions':
        case 'card.plan':
        case 'card.weekly_review': {
          const card: ChatCard =
            envelope.type === 'card.plan'
              ? { type: envelope.type, data: envelope.data }
              : envelope.type === 'card.next_actions'
                ? { type: envelope.type, data: envelope.data }
                : { type: envelope.type, data: envelope.data };
          set((state) => ({ cards: [...state.cards, card] }));
          return;
        }
        case 'tool.request':
          set((state) => ({ toolRequests: [...state.toolRequests, envelope.data] }));
          return;
        case 'tool.status':
          set((state) => ({
            toolStatuses: { ...state.toolStatuses, [envelope.data.request_id]: envelope.data.status },
          }));
          return;
        case 'policy.notice':
          set((state) => ({ notices: [...state.notices, envelope.data] }));
          return;
        case 'error':
          set({ error: envelope.data });
          return;
        case 'stream.open':
        case 'stream.done':
          return;
        case 'unknown':
          log.debug('Skipping unknown envelope', { type: envelope.rawType });
          return;
      }
    },

    clearError: () => set({ error: null }),

    reset: () => {
      get().stop();
      set({ ...initialState });
    },
  }));
}
