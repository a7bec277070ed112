export interface IClock {
  /** Current time in unix seconds. */
  now(): number;
}
