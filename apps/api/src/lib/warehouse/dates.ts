const YYYY_MM_DD_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_KEY_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

export const formatDateYYYYMMDD = (value: Date): string => {
  const year = value.getUTCFullYear();
  const month = `${value.getUTCMonth() + 1}`.padStart(2, "0");
  const day = `${value.getUTCDate()}`.padStart(2, "0");
  return `${year}-${month}-${day}`;
};

export const parseDateYYYYMMDD = (value: string | null | undefined): Date | null => {
  if (!value) {
    return null;
  }

  const match = value.match(YYYY_MM_DD_PATTERN);
  if (!match) {
    return null;
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() + 1 !== month ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
};

export const isValidDateYYYYMMDD = (value: string): boolean => parseDateYYYYMMDD(value) !== null;

/**
 * Converts `2026-02-01` into the warehouse integer date key `20260201`.
 * Returns null for anything that is not a real calendar date.
 */
export const toDateKey = (value: string): number | null => {
  const parsed = parseDateYYYYMMDD(value);
  if (!parsed) {
    return null;
  }

  return Number.parseInt(formatDateYYYYMMDD(parsed).replace(/-/g, ""), 10);
};

export const fromDateKey = (dateKey: number): string | null => {
  const match = String(dateKey).match(DATE_KEY_PATTERN);
  if (!match) {
    return null;
  }

  const iso = `${match[1]}-${match[2]}-${match[3]}`;
  return isValidDateYYYYMMDD(iso) ? iso : null;
};
