const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

const RELEASE_DATE = /^([A-Z][a-z]{2})\s(\d{1,2}),\s(\d{4})$/;

/**
 * Parse a release-page date such as `Jan 1, 2021` into UTC midnight of that
 * day. Returns null for anything else, including impossible days.
 */
export function parseReleaseDate(text: string): Date | null {
  const match = RELEASE_DATE.exec(text.trim());
  if (!match) {
    return null;
  }

  const month = MONTHS.findIndex(name => name === match[1]);
  if (month === -1) {
    return null;
  }
  const day = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month, day));

  // Date.UTC rolls Feb 30 over into March
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/** `Jan 01, 2021` */
export function formatReleaseDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${MONTHS[date.getUTCMonth()]} ${day}, ${date.getUTCFullYear()}`;
}
