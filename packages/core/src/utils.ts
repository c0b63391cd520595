export const clamp = (value: number, min = 0, max = 1): number =>
  Math.min(max, Math.max(min, value));

export const roundTo = (value: number, digits = 2): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/** Rounds to two decimals, then clamps into [0, 100]. NaN scores 0. */
export const toScore = (value: number): number => {
  if (Number.isNaN(value)) {
    return 0;
  }
  return clamp(roundTo(value), 0, 100);
};

/** Code-unit ordering, independent of the host locale. */
export const compareIds = (a: string, b: string): number => {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
};

export const uniqueInOrder = (values: Iterable<string>): string[] =>
  Array.from(new Set(values));

export const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.values(value).forEach(child => {
      deepFreeze(child);
    });
    Object.freeze(value);
  }
  return value;
};
