import { IFeeCalculator } from "../interfaces/feeCalculator";

export const HALF_HOUR_MS = 30 * 60_000;
export const DEFAULT_PRICE_PER_HOUR_CENTS = 200;

/** Bills started half-hours at a flat hourly rate. Zero elapsed time bills nothing. */
export class HalfHourFeeCalculator implements IFeeCalculator {
  constructor(private ratePerHourCents = DEFAULT_PRICE_PER_HOUR_CENTS) {}

  calculate(entryTimestamp: number, now: number): number {
    const elapsed = Math.max(0, now - entryTimestamp);
    const halfHours = Math.ceil(elapsed / HALF_HOUR_MS);
    return Math.round(halfHours * 0.5 * this.ratePerHourCents);
  }
}
