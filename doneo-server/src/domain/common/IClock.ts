/**
 * Source of the current time in epoch milliseconds.
 */
export interface IClock {
  now(): number;
}
