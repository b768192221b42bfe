import type { Logger } from 'pino';
import type { AttributeEnricher } from './attribute-enricher.js';
import type {
  Attributes,
  Backend,
  EnrichedEvent,
  EventParameters,
  TelemetryEvent,
} from '../domain/index.js';
import { createEvent, enrichEvent } from '../domain/index.js';

export interface EventDispatcherOptions {
  /** Static for the dispatcher's lifetime. When false every call is a no-op. */
  enabled: boolean;
  /** Fan-out order. Copied at construction; never changes afterwards. */
  backends: readonly Backend[];
  enricher: AttributeEnricher;
  log: Logger;
}

/**
 * Single choke point for telemetry.
 *
 * `logEvent` returns before any backend runs. Each call becomes one unit of
 * work chained onto `tail`, which acts as the dispatcher's mutex: a fan-out
 * starts only after the previous one has settled on every backend, so
 * backend calls from two dispatches never interleave.
 *
 * The chain grants the lock in submission order. That is an implementation
 * detail, not part of the contract: callers must not derive event ordering
 * from call order under contention.
 *
 * No retries, no persistence. A failing backend is logged and skipped.
 */
export class EventDispatcher {
  private readonly enabled: boolean;
  private readonly backends: readonly Backend[];
  private readonly enricher: AttributeEnricher;
  private readonly log: Logger;

  private tail: Promise<void> = Promise.resolve();
  private inFlight = 0;
  private closed = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: EventDispatcherOptions) {
    this.enabled = options.enabled;
    this.backends = Object.freeze([...options.backends]);
    this.enricher = options.enricher;
    this.log = options.log;
  }

  /** Dispatches submitted but not yet fanned out to every backend. */
  get pending(): number {
    return this.inFlight;
  }

  get backendNames(): readonly string[] {
    return this.backends.map((b) => b.name);
  }

  /**
   * Fire-and-forget. Never throws and never waits on a backend.
   */
  logEvent(
    category: string | undefined,
    action: string,
    parameters?: EventParameters,
  ): void {
    if (!this.enabled || this.closed) return;

    const event = createEvent(category, action, parameters);
    this.inFlight++;
    this.tail = this.tail.then(() => this.fanOut(event));
  }

  /** Resolves once every dispatch submitted so far has finished. */
  async drain(): Promise<void> {
    await this.tail;
  }

  /**
   * Stops accepting events, lets queued fan-outs finish, then closes the
   * backends. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.closed = true;
      this.shutdownPromise = this.drain().then(() => this.closeBackends());
    }
    return this.shutdownPromise;
  }

  /** Never rejects: a rejected link would poison every later dispatch. */
  private async fanOut(event: TelemetryEvent): Promise<void> {
    try {
      const enriched = enrichEvent(event, this.resolveAttributes(event));
      for (const backend of this.backends) {
        await this.sendTo(backend, enriched);
      }
    } catch (err: unknown) {
      this.log.error({ err, action: event.action }, 'Telemetry fan-out aborted');
    } finally {
      this.inFlight--;
    }
  }

  private resolveAttributes(event: TelemetryEvent): Attributes {
    try {
      return this.enricher.getAttributes();
    } catch (err: unknown) {
      this.log.warn(
        { err, action: event.action },
        'Attribute enrichment failed, dispatching without attributes',
      );
      return {};
    }
  }

  private async sendTo(backend: Backend, event: EnrichedEvent): Promise<void> {
    try {
      const result = await backend.send(event);
      if (!result.ok) {
        this.log.warn(
          { err: result.error, backend: backend.name, category: event.category, action: event.action },
          'Telemetry backend reported failure',
        );
      }
    } catch (err: unknown) {
      this.log.warn(
        { err, backend: backend.name, category: event.category, action: event.action },
        'Telemetry backend threw',
      );
    }
  }

  private async closeBackends(): Promise<void> {
    for (const backend of this.backends) {
      if (!backend.close) continue;
      try {
        await backend.close();
        this.log.debug({ backend: backend.name }, 'Telemetry backend closed');
      } catch (err: unknown) {
        this.log.warn({ err, backend: backend.name }, 'Failed to close telemetry backend');
      }
    }
  }
}
