export type {
  AttributeValue,
  Attributes,
  EventParameters,
  TelemetryEvent,
  EnrichedEvent,
} from './event.js';
export { createEvent, enrichEvent } from './event.js';
export type { Backend, SendResult } from './backend.js';
export { SENT, SKIPPED, failed } from './backend.js';
