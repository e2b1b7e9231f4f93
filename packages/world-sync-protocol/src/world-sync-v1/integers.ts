export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const UINT16_MAX = 0xffff;
export const UINT32_MAX = 0xffffffff;

const integerTokenPattern = /^[+-]?\d+$/;

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

export function isUint16(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= UINT16_MAX;
}

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= UINT32_MAX;
}

/**
 * Parses a decimal integer token (optional sign, digits only).
 * Returns null for anything else, including values outside the given range.
 */
export function parseIntegerToken(token: string, min: number, max: number): number | null {
  if (!integerTokenPattern.test(token)) {
    return null;
  }
  const value = Number(token);
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    return null;
  }
  // Avoid handing out -0 for "-0"
  return value === 0 ? 0 : value;
}
