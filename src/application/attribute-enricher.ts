import { randomUUID } from 'node:crypto';
import { hostname, platform } from 'node:os';
import type { Attributes, AttributeValue } from '../domain/index.js';

/**
 * Source of contextual attributes merged into every event.
 *
 * Called once per dispatch, on the dispatch path, never cached by the
 * dispatcher: values such as the session id or memory usage must reflect
 * the moment the event is delivered.
 */
export interface AttributeEnricher {
  getAttributes(): Attributes;
}

export interface SessionEnricherOptions {
  appVersion: string;
  /** Extra constant attributes (deployment, region, ...). */
  staticAttributes?: Readonly<Record<string, AttributeValue>>;
  /** Clock override, used by tests. */
  now?: () => Date;
}

/**
 * Default enricher for the service process.
 *
 * Reports the current session id, host identity and a few process stats.
 */
export class SessionEnricher implements AttributeEnricher {
  private sessionId: string = randomUUID();
  private readonly host = hostname();
  private readonly os = platform();
  private readonly now: () => Date;

  constructor(private readonly options: SessionEnricherOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get currentSessionId(): string {
    return this.sessionId;
  }

  /** Starts a new session; subsequent events carry the new id. */
  rotateSession(): string {
    this.sessionId = randomUUID();
    return this.sessionId;
  }

  getAttributes(): Attributes {
    return {
      ...this.options.staticAttributes,
      session_id: this.sessionId,
      app_version: this.options.appVersion,
      hostname: this.host,
      platform: this.os,
      uptime_s: Math.round(process.uptime()),
      memory_rss_mb: Math.round(process.memoryUsage().rss / 1024 / 1024),
      timestamp: this.now().toISOString(),
    };
  }
}
