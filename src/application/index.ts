export { EventDispatcher } from './event-dispatcher.js';
export type { EventDispatcherOptions } from './event-dispatcher.js';
export { SessionEnricher } from './attribute-enricher.js';
export type { AttributeEnricher, SessionEnricherOptions } from './attribute-enricher.js';
export { SettingsStore } from './settings-store.js';
export { eventSchema, eventBatchSchema, MAX_BATCH_SIZE } from './event-schema.js';
export type { EventInput } from './event-schema.js';
