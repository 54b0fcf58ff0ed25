import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);

const RFC3339_PATTERN =
  /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?<offset>[Zz]|[+-]\d{2}:\d{2})$/;

const MINUTE_MS = 60_000;

export type EventInstant = {
  epochMs: number;
  /** UTC offset the timestamp was written in, in minutes east of UTC. */
  offsetMinutes: number;
};

export function parseEventTime(value: string | Date | null | undefined): EventInstant | null {
  if (value instanceof Date) {
    const parsed = dayjs.utc(value);
    return parsed.isValid() ? { epochMs: parsed.valueOf(), offsetMinutes: 0 } : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  const offset = RFC3339_PATTERN.exec(text)?.groups?.offset;
  if (typeof offset !== 'string') {
    return null;
  }
  const parsed = dayjs.utc(text);
  if (!parsed.isValid()) {
    return null;
  }
  return { epochMs: parsed.valueOf(), offsetMinutes: parseOffset(offset) };
}

function parseOffset(designator: string): number {
  if (designator === 'Z' || designator === 'z') {
    return 0;
  }
  const sign = designator.startsWith('-') ? -1 : 1;
  const [hours = 0, minutes = 0] = designator.slice(1).split(':').map(Number);
  return sign * (hours * 60 + minutes);
}

export type TimeOfDay = {
  hours: number;
  minutes: number;
  seconds: number;
};

/**
 * Places a wall-clock time on the reference's calendar day, in the
 * reference's own offset, carrying over its sub-second part. Out-of-range
 * components roll over (25:00 is 01:00 on the following day).
 *
 * Returns `NaN` when the result falls outside the range a `Date` can hold.
 */
export function anchorOnReferenceDay(reference: EventInstant, time: TimeOfDay): number {
  const offsetMs = reference.offsetMinutes * MINUTE_MS;
  const wallClock = dayjs
    .utc(reference.epochMs + offsetMs)
    .hour(time.hours)
    .minute(time.minutes)
    .second(time.seconds);
  return wallClock.isValid() ? wallClock.valueOf() - offsetMs : Number.NaN;
}
