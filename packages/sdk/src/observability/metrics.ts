/**
 * Counters for link base event handling
 */

import type { WatchEventKind } from "../types.js";

export interface LinkBaseCounters {
  events: Record<WatchEventKind, number>;
  ignored: number;
  parseFailures: number;
  hidden: number;
  duplicates: number;
  added: number;
  removed: number;
}

function emptyCounters(): LinkBaseCounters {
  return {
    events: { added: 0, modified: 0, removed: 0, "self-removed": 0 },
    ignored: 0,
    parseFailures: 0,
    hidden: 0,
    duplicates: 0,
    added: 0,
    removed: 0,
  };
}

/**
 * Per-instance counters; every link base owns one
 */
export class LinkBaseMetrics {
  readonly #counters = emptyCounters();

  recordEvent(kind: WatchEventKind): void {
    this.#counters.events[kind]++;
  }

  recordIgnored(): void {
    this.#counters.ignored++;
  }

  recordParseFailure(): void {
    this.#counters.parseFailures++;
  }

  recordHidden(): void {
    this.#counters.hidden++;
  }

  recordDuplicate(): void {
    this.#counters.duplicates++;
  }

  recordAdded(): void {
    this.#counters.added++;
  }

  recordRemoved(): void {
    this.#counters.removed++;
  }

  /**
   * Copy of the current counters
   */
  snapshot(): LinkBaseCounters {
    return { ...this.#counters, events: { ...this.#counters.events } };
  }
}
