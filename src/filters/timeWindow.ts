import type { ClusterEvent, DiagnosticSink, EventFilter, FilterResult } from '../types.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { formatDuration } from '../utils/duration.js';
import { anchorOnReferenceDay, parseEventTime, type TimeOfDay } from '../utils/time.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export class AroundTimeFormatError extends Error {
  constructor(
    public readonly input: string,
    detail: string
  ) {
    super(detail);
    this.name = 'AroundTimeFormatError';
  }
}

function parseComponent(input: string, label: string, value: string): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new AroundTimeFormatError(input, `${label} ${JSON.stringify(value)} is not an integer`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Parses `HH:MM` or `HH:MM:SS`. Values are not range-checked; they roll over
 * when placed on a calendar day.
 */
export function parseAroundTime(input: string): TimeOfDay {
  const parts = input.split(':');
  if (parts.length < 2 || parts.length > 3) {
    throw new AroundTimeFormatError(
      input,
      `invalid around time format, must be HH:MM or HH:MM:SS, got ${JSON.stringify(input)}`
    );
  }
  const [hours = '', minutes = '', seconds] = parts;
  return {
    hours: parseComponent(input, 'hours', hours),
    minutes: parseComponent(input, 'minutes', minutes),
    seconds: typeof seconds === 'string' ? parseComponent(input, 'seconds', seconds) : 0
  };
}

export type AroundTimeFilterOptions = {
  around: string;
  durationMs: number;
  stderr?: DiagnosticSink;
  metrics?: MetricsRegistry;
};

/**
 * Keeps events whose last occurrence lies within `durationMs` of the `around`
 * wall-clock time, taken on the calendar day of the last input event.
 * Both bounds are inclusive.
 *
 * Returns `null` after writing a diagnostic when the window cannot be
 * anchored: malformed `around`, no input events, a reference event without
 * a readable timestamp, or a window past the supported date range.
 */
export class AroundTimeFilter implements EventFilter {
  readonly name = 'around';
  readonly around: string;
  readonly durationMs: number;
  private readonly stderr: DiagnosticSink;
  private readonly metrics: MetricsRegistry;

  constructor(options: AroundTimeFilterOptions) {
    this.around = options.around;
    this.durationMs = options.durationMs;
    this.stderr = options.stderr ?? process.stderr;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  filterEvents(events: readonly ClusterEvent[]): FilterResult {
    const reference = events[events.length - 1];
    if (!reference) {
      return this.fail(
        `cannot anchor around time ${JSON.stringify(this.around)}: no events to take the date from`
      );
    }
    const referenceTime = parseEventTime(reference.lastTimestamp);
    if (!referenceTime) {
      return this.fail(
        `cannot anchor around time ${JSON.stringify(this.around)}: last event has unreadable timestamp ${JSON.stringify(String(reference.lastTimestamp))}`
      );
    }

    let timeOfDay: TimeOfDay;
    try {
      timeOfDay = parseAroundTime(this.around);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return this.fail(`error parsing around time ${JSON.stringify(this.around)}: ${detail}`);
    }

    const anchor = anchorOnReferenceDay(referenceTime, timeOfDay);
    const lower = anchor - this.durationMs;
    const upper = anchor + this.durationMs;
    if (!Number.isFinite(lower) || !Number.isFinite(upper)) {
      return this.fail(
        `cannot anchor around time ${JSON.stringify(this.around)}: window falls outside the supported date range`
      );
    }

    const kept: ClusterEvent[] = [];
    for (const event of events) {
      const instant = parseEventTime(event.lastTimestamp);
      if (!instant) {
        continue;
      }
      if (instant.epochMs > upper || instant.epochMs < lower) {
        continue;
      }
      kept.push(event);
    }
    return kept;
  }

  describe(): string {
    return `around ${this.around} ±${formatDuration(this.durationMs)}`;
  }

  private fail(message: string): null {
    this.stderr.write(`${message}\n`);
    this.metrics.recordFilterFailure(this.name, message);
    return null;
  }
}
