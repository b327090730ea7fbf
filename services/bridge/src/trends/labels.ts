import type { LabelStyle, NormalizedTimestamp } from './types';

const pad = (value: number) => String(value).padStart(2, '0');

/** Renders the wall-clock time of `instant` in the offset it was recorded with. */
export function formatLabel(instant: NormalizedTimestamp, style: LabelStyle): string {
  const wallClock = new Date(instant.epochMs + instant.offsetMinutes * 60_000);
  const time = `${pad(wallClock.getUTCHours())}:${pad(wallClock.getUTCMinutes())}`;
  const date = `${pad(wallClock.getUTCMonth() + 1)}/${pad(wallClock.getUTCDate())}`;
  switch (style) {
    case 'time':
      return time;
    case 'date-time':
      return `${date} ${time}`;
    case 'date':
      return date;
    default: {
      const unknownStyle: never = style;
      throw new Error(`Unsupported label style: ${String(unknownStyle)}`);
    }
  }
}
