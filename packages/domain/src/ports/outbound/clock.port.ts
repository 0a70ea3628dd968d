/** Source of trusted, server-assigned time. Device clocks are never used for lifecycle timestamps. */
export interface ClockPort {
  now(): Promise<Date>;
}
