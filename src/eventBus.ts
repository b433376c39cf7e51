import { EventEmitter } from 'node:events';
import logger, { type ComponentLogger } from './logger.js';
import type { EventPayload, EventRecord } from './types.js';

const EVENT_CHANNEL = 'event';

interface EventBusDependencies {
  store?: (event: EventRecord) => void;
  log?: ComponentLogger;
}

function normalizeTimestamp(ts: EventPayload['ts']): number {
  if (ts instanceof Date) {
    return ts.getTime();
  }
  if (typeof ts === 'number' && Number.isFinite(ts)) {
    return ts;
  }
  return Date.now();
}

/**
 * Lifecycle event fan-out: every emitted event is logged, persisted when a store is
 * attached, and delivered to `event` listeners.
 */
class EventBus extends EventEmitter {
  private store: ((event: EventRecord) => void) | null;
  private readonly log: ComponentLogger;

  constructor(dependencies: EventBusDependencies = {}) {
    super();
    this.store = dependencies.store ?? null;
    this.log = dependencies.log ?? logger;
  }

  attachStore(store: ((event: EventRecord) => void) | null) {
    this.store = store;
  }

  emitEvent(payload: EventPayload): EventRecord {
    const record: EventRecord = {
      ts: normalizeTimestamp(payload.ts),
      source: payload.source,
      kind: payload.kind,
      severity: payload.severity,
      message: payload.message,
      meta: payload.meta
    };

    if (this.store) {
      try {
        this.store(record);
      } catch (error) {
        this.log.error({ err: error, kind: record.kind }, 'Failed to persist event');
      }
    }

    const logPayload = { source: record.source, kind: record.kind, meta: record.meta };
    if (record.severity === 'critical') {
      this.log.error(logPayload, record.message);
    } else if (record.severity === 'warning') {
      this.log.warn(logPayload, record.message);
    } else {
      this.log.info(logPayload, record.message);
    }

    this.emit(EVENT_CHANNEL, record);
    return record;
  }
}

const eventBus = new EventBus();

export { EventBus };
export default eventBus;
