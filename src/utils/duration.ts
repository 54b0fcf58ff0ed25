import dayjs from 'dayjs';
import durationPlugin from 'dayjs/plugin/duration.js';

dayjs.extend(durationPlugin);

type DurationUnit = 'millisecond' | 'second' | 'minute' | 'hour';

const UNITS: Record<string, { unit: DurationUnit; scale: number }> = {
  ns: { unit: 'millisecond', scale: 1e-6 },
  us: { unit: 'millisecond', scale: 1e-3 },
  'µs': { unit: 'millisecond', scale: 1e-3 },
  'μs': { unit: 'millisecond', scale: 1e-3 },
  ms: { unit: 'millisecond', scale: 1 },
  s: { unit: 'second', scale: 1 },
  m: { unit: 'minute', scale: 1 },
  h: { unit: 'hour', scale: 1 }
};

const SEGMENT_PATTERN = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

/**
 * Accepts milliseconds or a duration string made of number/unit pairs such as
 * `90s`, `2m`, `1h30m` or `1.5h`.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`invalid duration ${String(value)}`);
    }
    return value;
  }

  const input = value.trim();
  const sign = input.startsWith('-') ? -1 : 1;
  const body = input.startsWith('-') || input.startsWith('+') ? input.slice(1) : input;
  if (body === '0') {
    return 0;
  }
  if (body.length === 0) {
    throw new Error(`invalid duration "${value}"`);
  }

  let total = dayjs.duration(0);
  let cursor = 0;
  while (cursor < body.length) {
    SEGMENT_PATTERN.lastIndex = cursor;
    const match = SEGMENT_PATTERN.exec(body);
    const amount = match?.[1];
    const unit = UNITS[match?.[2] ?? ''];
    if (!match || amount === undefined || !unit) {
      const rest = input.slice(input.length - body.length + cursor);
      const detail = /^[\d.]+$/.test(rest) ? 'missing unit' : `unexpected "${rest}"`;
      throw new Error(`invalid duration "${value}": ${detail}`);
    }
    total = total.add(Number(amount) * unit.scale, unit.unit);
    cursor = SEGMENT_PATTERN.lastIndex;
  }

  const milliseconds = total.asMilliseconds();
  if (!Number.isFinite(milliseconds)) {
    throw new Error(`invalid duration "${value}"`);
  }
  return sign * milliseconds;
}

export function formatDuration(durationMs: number): string {
  if (durationMs === 0) {
    return '0s';
  }
  const parts = dayjs.duration(Math.abs(durationMs));
  const hours = Math.floor(parts.asHours());
  const minutes = parts.minutes();
  const remainderMs = parts.seconds() * 1_000 + parts.milliseconds();

  let text = '';
  if (hours > 0) {
    text += `${hours}h`;
  }
  if (minutes > 0) {
    text += `${minutes}m`;
  }
  if (remainderMs > 0 || text.length === 0) {
    text += remainderMs % 1_000 === 0 ? `${remainderMs / 1_000}s` : `${remainderMs}ms`;
  }
  return `${durationMs < 0 ? '-' : ''}${text}`;
}
