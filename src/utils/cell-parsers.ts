/**
 * Helpers for spreadsheet cell values
 */

/**
 * Parse a whole integer from a cell. Fractional or partially numeric text is rejected.
 */
export function parseInteger(value: string | number | undefined | null): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }

  const str = value.trim();
  if (!/^-?\d+$/.test(str)) {
    return undefined;
  }

  return Number.parseInt(str, 10);
}

/**
 * Clean string value - trim and handle empty
 */
export function cleanString(value: string | undefined | null): string | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
