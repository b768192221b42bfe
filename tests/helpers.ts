import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Attributes, Backend, EnrichedEvent, SendResult } from '../src/domain/index.js';
import { SENT } from '../src/domain/index.js';
import type { AttributeEnricher } from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

/** Backend that remembers every event it receives. */
export class RecordingBackend implements Backend {
  readonly received: EnrichedEvent[] = [];
  readonly close = vi.fn(async () => {});

  constructor(readonly name = 'recording') {}

  async send(event: EnrichedEvent): Promise<SendResult> {
    this.received.push(event);
    return SENT;
  }
}

/** Backend whose send always throws. */
export class ThrowingBackend implements Backend {
  calls = 0;

  constructor(readonly name = 'throwing') {}

  async send(): Promise<SendResult> {
    this.calls++;
    throw new Error('transport down');
  }
}

export function staticEnricher(attributes: Attributes): AttributeEnricher {
  return { getAttributes: () => attributes };
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Lets every queued microtask and the next macrotask run. */
export function tick(): Promise<void> {
  return new Promise((r) => setTimeout(r, 0));
}
