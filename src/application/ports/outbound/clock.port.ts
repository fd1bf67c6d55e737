/**
 * Source of the current time. Use cases never read the system clock directly.
 */
export interface IClockPort {
  now(): Date;
}
