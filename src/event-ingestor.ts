/**
 * @fileoverview Host event ingestion
 *
 * Adapts host lifecycle notifications (`session:start`, `tool:pre`, ...)
 * into {@link TrackerEvent}s and hands them to the {@link StateTracker}.
 *
 * `ingest()` only decodes and enqueues; a microtask drains the queue. The
 * host's event delivery therefore never waits on state tracking, and never
 * on terminal output (which lives in the render loop).
 *
 * The queue is bounded. When it is full the backlog is drained inline before
 * the new event is queued: `apply()` is O(1), and dropping events would break
 * token totals and terminal detection.
 *
 * @module event-ingestor
 */

import { EventEmitter } from 'node:events';
import { z } from 'zod';
import {
  DEFAULT_EVENT_QUEUE_CAPACITY,
  MAX_ERROR_MESSAGE_LENGTH,
} from './config/limits.js';
import type { StateTracker } from './state-tracker.js';
import { getErrorMessage, type TrackerEvent } from './types.js';

// ========== Payload Schemas ==========

// Wrongly typed fields count as absent rather than failing the whole event
const optionalString = z.string().optional().catch(undefined);
const tokenDelta = z.number().int().nonnegative().optional().catch(undefined);

const SessionStartPayload = z.object({
  session_id: optionalString,
});

const SessionErrorPayload = z.object({
  error: z.unknown(),
});

const LlmRequestPayload = z.object({
  token_count: tokenDelta,
});

const LlmResponsePayload = z.object({
  token_count: tokenDelta,
  usage: z
    .object({
      input_tokens: tokenDelta,
      output_tokens: tokenDelta,
    })
    .optional()
    .catch(undefined),
});

const ToolPrePayload = z.object({
  tool_name: optionalString,
  name: optionalString,
});

const AgentSpawnedPayload = z.object({
  agent: optionalString,
  session_id: optionalString,
});

const AgentCompletePayload = z.object({
  session_id: optionalString,
});

const STREAM_PREFIX = 'llm:stream_';

/**
 * Decode one host event.
 *
 * @param type - Host event name
 * @param payload - Host payload; must be an object, null or undefined
 * @returns The decoded event, or null for unknown types and malformed payloads
 */
export function decodeHostEvent(type: string, payload: unknown): TrackerEvent | null {
  if (payload !== undefined && payload !== null && (typeof payload !== 'object' || Array.isArray(payload))) {
    return null;
  }
  const data = payload ?? {};

  switch (type) {
    case 'session:start': {
      const p = SessionStartPayload.parse(data);
      return { kind: 'session:start', sessionId: p.session_id };
    }
    case 'session:end':
      return { kind: 'session:end' };
    case 'session:error': {
      const p = SessionErrorPayload.parse(data);
      const message = p.error === undefined || p.error === null
        ? undefined
        : getErrorMessage(p.error).slice(0, MAX_ERROR_MESSAGE_LENGTH);
      return { kind: 'session:error', message };
    }
    case 'llm:request': {
      const p = LlmRequestPayload.parse(data);
      return { kind: 'llm:request', tokensIn: p.token_count ?? 0 };
    }
    case 'llm:response': {
      const p = LlmResponsePayload.parse(data);
      if (p.token_count !== undefined) {
        return { kind: 'llm:response', tokensIn: 0, tokensOut: p.token_count };
      }
      return {
        kind: 'llm:response',
        tokensIn: p.usage?.input_tokens ?? 0,
        tokensOut: p.usage?.output_tokens ?? 0,
      };
    }
    case 'tool:pre': {
      const p = ToolPrePayload.parse(data);
      return { kind: 'tool:pre', toolName: p.tool_name ?? p.name ?? 'tool' };
    }
    case 'tool:post':
      return { kind: 'tool:post' };
    case 'turn:start':
      return { kind: 'turn:start' };
    case 'turn:end':
      return { kind: 'turn:end' };
    case 'task:agent_spawned': {
      const p = AgentSpawnedPayload.parse(data);
      return { kind: 'task:agent_spawned', agentName: p.agent ?? 'agent', subSessionId: p.session_id };
    }
    case 'task:agent_complete': {
      const p = AgentCompletePayload.parse(data);
      return { kind: 'task:agent_complete', subSessionId: p.session_id };
    }
    default:
      if (type.startsWith(STREAM_PREFIX) && type.length > STREAM_PREFIX.length) {
        return { kind: 'llm:stream', phase: type.slice(STREAM_PREFIX.length) };
      }
      return null;
  }
}

// ========== Ingestor ==========

export interface EventIngestorOptions {
  /** Queue size before an inline drain (default 1024) */
  capacity?: number;
}

export interface EventIngestorEvents {
  /** Event was not queued (unknown type or malformed payload) */
  eventIgnored: (type: string, reason: string) => void;
  /** Debug log message */
  log: (message: string) => void;
}

export class EventIngestor extends EventEmitter {
  private readonly tracker: StateTracker;
  private readonly capacity: number;
  private queue: TrackerEvent[] = [];
  private drainScheduled = false;

  constructor(tracker: StateTracker, options: EventIngestorOptions = {}) {
    super();
    this.tracker = tracker;
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_EVENT_QUEUE_CAPACITY);
  }

  /** Events queued but not yet applied */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Accept a host event. Returns immediately; never throws.
   *
   * @returns true if the event was queued
   * @fires eventIgnored
   */
  ingest(type: string, payload?: unknown): boolean {
    let event: TrackerEvent | null;
    try {
      event = decodeHostEvent(type, payload);
    } catch (err) {
      this.ignore(type, `decode failed: ${getErrorMessage(err)}`);
      return false;
    }
    if (!event) {
      this.ignore(type, 'unrecognized event or malformed payload');
      return false;
    }

    if (this.queue.length >= this.capacity) {
      this.log(`Queue full (${this.capacity}), draining inline`);
      this.flush();
    }
    this.queue.push(event);
    this.scheduleDrain();
    return true;
  }

  /**
   * Apply every queued event now.
   *
   * @returns Number of events applied or rejected by the tracker
   */
  flush(): number {
    const batch = this.queue;
    this.queue = [];
    for (const event of batch) {
      try {
        this.tracker.apply(event);
      } catch (err) {
        // A throwing tracker listener must not take the remaining events with it
        this.log(`Error applying ${event.kind}: ${getErrorMessage(err)}`);
      }
    }
    return batch.length;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      this.flush();
    });
  }

  private ignore(type: string, reason: string): void {
    this.log(`Ignoring ${type}: ${reason}`);
    this.emit('eventIgnored', type, reason);
  }

  private log(message: string): void {
    const timestamp = new Date().toISOString();
    this.emit('log', `[${timestamp}] [EventIngestor] ${message}`);
  }
}
