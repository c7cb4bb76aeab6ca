const TIMESTAMP_PATTERN = /^(\d+):(\d{2}):(\d{2})(?:\.(\d{1,3}))?$/;

/**
 * Convert `HH:MM:SS` or `HH:MM:SS.mmm` to seconds. Hours are unbounded;
 * minutes and seconds must be below 60. Computed in whole milliseconds so the
 * result is exact for every representable input.
 */
export function toSeconds(timestamp: string): number {
  const match = TIMESTAMP_PATTERN.exec(timestamp.trim());
  if (!match) {
    throw new RangeError(`Invalid timestamp "${timestamp}" (expected HH:MM:SS or HH:MM:SS.mmm)`);
  }

  const [, hoursPart, minutesPart, secondsPart, fractionPart] = match;
  const minutes = Number(minutesPart);
  const seconds = Number(secondsPart);

  if (minutes >= 60) {
    throw new RangeError(`Minute value ${minutes} out of range in "${timestamp}"`);
  }
  if (seconds >= 60) {
    throw new RangeError(`Second value ${seconds} out of range in "${timestamp}"`);
  }

  const millis = fractionPart ? Number(fractionPart.padEnd(3, '0')) : 0;
  const totalMs = Number(hoursPart) * 3_600_000 + minutes * 60_000 + seconds * 1000 + millis;
  return totalMs / 1000;
}

export function isTimestamp(value: string): boolean {
  return TIMESTAMP_PATTERN.test(value.trim());
}

export interface FormatTimestampOptions {
  milliseconds?: boolean;
}

/**
 * Inverse of {@link toSeconds}. Without `milliseconds` the fractional part is
 * truncated, matching how start-only transcripts are written.
 */
export function formatTimestamp(seconds: number, options: FormatTimestampOptions = {}): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new RangeError(`Cannot format ${seconds} as a timestamp`);
  }

  const totalMs = options.milliseconds ? Math.round(seconds * 1000) : Math.floor(seconds) * 1000;
  const h = Math.floor(totalMs / 3_600_000);
  const m = Math.floor((totalMs % 3_600_000) / 60_000);
  const s = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;

  const base = `${h.toString().padStart(2, '0')}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`;
  return options.milliseconds ? `${base}.${ms.toString().padStart(3, '0')}` : base;
}
