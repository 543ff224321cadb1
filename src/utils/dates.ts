import dayjs from 'dayjs';
import { DATE_MMDD_RE } from '../parsing/patterns.js';

export const ISO_DATE_FORMAT = 'YYYY-MM-DD';

function calendarDate(year: number, month: number, day: number): dayjs.Dayjs | null {
  const candidate = dayjs(new Date(year, month - 1, day));
  // Date rolls 02/29 over into March in common years
  if (!candidate.isValid() || candidate.month() !== month - 1 || candidate.date() !== day) {
    return null;
  }
  return candidate;
}

/**
 * Resolves a `MM/DD` token to a full date using the reference date's year as the center:
 * the reference year, the year before and the year after are tried, and the one closest to
 * `reference` wins. Ties go to the earlier candidate in that order.
 *
 * @example resolveDate('12/31', '2024-01-02') // '2023-12-31'
 */
export function resolveDate(mmdd: string, reference: string): string | null {
  const match = DATE_MMDD_RE.exec(mmdd);
  if (!match) return null;

  const month = parseInt(match[1], 10);
  const day = parseInt(match[2], 10);
  const ref = dayjs(reference);
  if (!ref.isValid()) return null;

  let best: { date: dayjs.Dayjs; distance: number } | null = null;
  for (const offset of [0, -1, 1]) {
    const candidate = calendarDate(ref.year() + offset, month, day);
    if (!candidate) continue;

    const distance = Math.abs(candidate.diff(ref.startOf('day'), 'day'));
    if (!best || distance < best.distance) {
      best = { date: candidate, distance };
    }
  }

  return best ? best.date.format(ISO_DATE_FORMAT) : null;
}

export function referenceDateFor(daysAgo: number, today: dayjs.Dayjs = dayjs()): string {
  return today.subtract(daysAgo, 'day').format(ISO_DATE_FORMAT);
}
