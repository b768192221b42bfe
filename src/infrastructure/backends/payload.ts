import type { AttributeValue, EnrichedEvent } from '../../domain/index.js';

/**
 * Flat wire mapping published by every transport backend.
 *
 * Merged attributes come first; `category` and `event_action` are written
 * last and override attributes of the same name. `category` is omitted
 * when the event has none.
 */
export type FlatPayload = Record<string, AttributeValue>;

export function flattenEvent(event: EnrichedEvent): FlatPayload {
  const flat: FlatPayload = { ...event.attributes };
  if (event.category !== undefined) {
    flat['category'] = event.category;
  }
  flat['event_action'] = event.action;
  return flat;
}

export function serializeEvent(event: EnrichedEvent): string {
  return JSON.stringify(flattenEvent(event));
}
