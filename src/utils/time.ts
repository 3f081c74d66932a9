import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(customParseFormat);
dayjs.extend(utc);

const TIMES = ['HH', 'HH:mm', 'HH:mm:ss', 'HH:mm:ss.SSS'];

// Naive inputs are read as UTC, strictly, after padding and fraction cleanup
const NAIVE_FORMATS = [
  'YYYY-MM-DD',
  ...TIMES.map((time) => `YYYY-MM-DD[T]${time}`),
  ...TIMES.map((time) => `YYYY-MM-DD ${time}`),
  'YYYY/MM/DD',
  ...TIMES.map((time) => `YYYY/MM/DD ${time}`),
  'YYYYMMDD',
  'MM/DD/YYYY',
];

const WITH_OFFSET = /^(.+[T ]\d{1,2}(?::\d{2}){0,2}(?:\.\d+)?)(Z|[+-]\d{2}(?::?\d{2})?)$/i;

/** Zero-pads `2024-1-5`, `1/5/2024` and single-digit hours; keeps milliseconds of any fraction. */
function normalize(text: string): string {
  return text
    .replace(/^(\d{4})([-/])(\d{1,2})\2(\d{1,2})(?=$|[T ])/, (_, y: string, sep: string, m: string, d: string) =>
      `${y}${sep}${m.padStart(2, '0')}${sep}${d.padStart(2, '0')}`,
    )
    .replace(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, (_, m: string, d: string, y: string) => `${m.padStart(2, '0')}/${d.padStart(2, '0')}/${y}`)
    .replace(/([T ])(\d)(?=:|$)/, (_, sep: string, hour: string) => `${sep}0${hour}`)
    .replace(/(:\d{2})\.(\d+)$/, (_, seconds: string, fraction: string) => `${seconds}.${fraction.padEnd(3, '0').slice(0, 3)}`);
}

/** Minutes east of UTC for `Z`, `+02`, `+0200` or `-05:30`. */
function offsetMinutes(offset: string): number {
  if (offset.toUpperCase() === 'Z') return 0;
  const digits = offset.slice(1).replace(':', '');
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2) || '0');
  return offset.startsWith('-') ? -minutes : minutes;
}

function parseNaive(text: string): dayjs.Dayjs | null {
  const normalized = normalize(text);
  for (const format of NAIVE_FORMATS) {
    const parsed = dayjs.utc(normalized, format, true);
    if (parsed.isValid()) return parsed;
  }
  return null;
}

/** Parses common ISO-8601 shapes and a few others; returns null when nothing matches. */
export function parseFlexibleDatetime(value: string): Date | null {
  const text = value.trim();
  if (!text) return null;

  const match = WITH_OFFSET.exec(text);
  if (match?.[1] && match[2]) {
    const local = parseNaive(match[1]);
    return local ? local.subtract(offsetMinutes(match[2]), 'minute').toDate() : null;
  }

  return parseNaive(text)?.toDate() ?? null;
}

/** UTC timestamp text without offset, e.g. `2024-01-31T00:00:00`. */
export function formatTimestamp(date: Date): string {
  const d = dayjs.utc(date);
  return d.millisecond() ? d.format('YYYY-MM-DDTHH:mm:ss.SSS') : d.format('YYYY-MM-DDTHH:mm:ss');
}
