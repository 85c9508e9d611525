export const MINOR_UNITS_PER_MAJOR = 100;

/** True when the amount converts to a safe integer number of minor units. */
export const isRepresentableAmount = (amount: number): boolean =>
  Number.isSafeInteger(Math.round(amount * MINOR_UNITS_PER_MAJOR));

export const toMinorUnits = (amount: number): number => {
  if (!isRepresentableAmount(amount)) {
    throw new Error(`Invalid monetary amount: ${amount}`);
  }
  return Math.round(amount * MINOR_UNITS_PER_MAJOR);
};

export const toMajorUnits = (minor: number): number => minor / MINOR_UNITS_PER_MAJOR;

export const nullableMajorUnits = (minor: number | null): number | null =>
  minor === null ? null : toMajorUnits(minor);
