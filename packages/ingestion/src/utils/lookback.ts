const HOUR_MS = 60 * 60 * 1000;

/** Lower time bound of the catch-up window: run start minus the lookback duration. */
export const computeSince = (runStart: Date, lookbackHours: number): Date =>
  new Date(runStart.getTime() - lookbackHours * HOUR_MS);
