import moment from 'moment';

/**
 * Strict ISO-8601 parse. Returns epoch milliseconds, or null for anything
 * moment would only accept through its lenient fallback.
 */
export const parseTimestamp = (timestamp: string): number | null => {
  const parsed = moment(timestamp, moment.ISO_8601, true);
  return parsed.isValid() ? parsed.valueOf() : null;
};

export const isValidTimestamp = (timestamp: string): boolean => parseTimestamp(timestamp) !== null;

/**
 * Stable chronological sort: equal timestamps keep their input order.
 * Unparseable timestamps sort last; callers validate before sorting.
 */
export const sortChronologically = <T extends { timestamp: string }>(items: T[]): T[] => {
  return items
    .map((item, index) => ({ item, index, time: parseTimestamp(item.timestamp) ?? Number.POSITIVE_INFINITY }))
    .sort((a, b) => (a.time === b.time ? a.index - b.index : a.time - b.time))
    .map(entry => entry.item);
};
