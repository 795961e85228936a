/**
 * Period and numeric cell conversion
 *
 * Periods become decimal years. `YYYY-MM` converts as year + month / 12, so
 * 2020-06 is 2020.5 and 2020-12 is 2021. Any other shape that is not a plain
 * number becomes null.
 */

const YEAR_ONLY = /^(\d{4})$/;
const YEAR_MONTH = /^(\d{4})-(\d{1,2})(?:-\d{1,2})?$/;

export function parsePeriod(raw: string | null | undefined): number | null {
  const text = raw?.trim();
  if (!text) {
    return null;
  }

  const year = YEAR_ONLY.exec(text);
  if (year?.[1]) {
    return Number(year[1]);
  }

  const yearMonth = YEAR_MONTH.exec(text);
  if (yearMonth?.[1] && yearMonth[2]) {
    const month = Number(yearMonth[2]);
    if (month < 1 || month > 12) {
      return null;
    }
    return Number(yearMonth[1]) + month / 12;
  }

  return parseNumber(text);
}

/**
 * Finite number or null. Empty cells, "NaN" and free text are all null.
 */
export function parseNumber(raw: string | null | undefined): number | null {
  const text = raw?.trim();
  if (!text) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
