/**
 * Core domain types for the telemetry event model.
 *
 * These types define the shape of an event from the moment a call site
 * logs it until every backend has seen it. They carry no framework
 * dependencies.
 */

/** Scalar value carried by an event parameter or an enrichment attribute. */
export type AttributeValue = string | number | boolean | null;

/** Flat key/value mapping. Keys are unique; insertion order carries no meaning. */
export type Attributes = Readonly<Record<string, AttributeValue>>;

/** Parameters supplied by the call site. */
export type EventParameters = Attributes;

/**
 * One logged occurrence, as the call site described it.
 *
 * Frozen at creation and owned by the dispatch that carries it.
 */
export interface TelemetryEvent {
  readonly category?: string | undefined;
  readonly action: string;
  readonly parameters: EventParameters;
}

/**
 * The event as backends receive it: enrichment attributes overlaid with
 * the event's own parameters. Computed once per dispatch.
 */
export interface EnrichedEvent {
  readonly category?: string | undefined;
  readonly action: string;
  readonly attributes: Attributes;
}

/**
 * Builds an immutable event. The parameter mapping is copied so the
 * caller may keep mutating its own object after logging.
 */
export function createEvent(
  category: string | undefined,
  action: string,
  parameters: EventParameters = {},
): TelemetryEvent {
  return Object.freeze({
    category,
    action,
    parameters: Object.freeze({ ...parameters }),
  });
}

/** Merges enrichment attributes with event parameters; event keys win. */
export function enrichEvent(event: TelemetryEvent, attributes: Attributes): EnrichedEvent {
  return Object.freeze({
    category: event.category,
    action: event.action,
    attributes: Object.freeze({ ...attributes, ...event.parameters }),
  });
}
