import type { EnrichedEvent } from './event.js';

/**
 * Outcome of a single backend delivery.
 *
 * `skipped` marks a "nothing to do" success (backend disabled or not
 * configured), which is not an error.
 */
export type SendResult =
  | { readonly ok: true; readonly skipped: boolean }
  | { readonly ok: false; readonly error: unknown };

/**
 * A delivery target for enriched events.
 *
 * `send` must settle only once delivery has finished: the dispatcher awaits
 * it before moving to the next backend, and any internal asynchrony the
 * backend needs has to complete inside that promise. Backends must not keep
 * the event after `send` settles.
 */
export interface Backend {
  readonly name: string;
  send(event: EnrichedEvent): Promise<SendResult>;
  /** Releases the underlying transport. Called once at shutdown. */
  close?(): Promise<void>;
}

export const SENT: SendResult = { ok: true, skipped: false };
export const SKIPPED: SendResult = { ok: true, skipped: true };

export function failed(error: unknown): SendResult {
  return { ok: false, error };
}
