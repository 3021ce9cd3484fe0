export interface IFeeCalculator {
  /** Fee in cents for a session that started at `entryTimestamp` and is billed at `now`. */
  calculate(entryTimestamp: number, now: number): number;
}
