/**
 * backend/src/shared/time/clock.ts
 *
 * WHY:
 * - Expiry checks and the compliance countdown depend on "now".
 * - Services take a Clock so tests can move time without fake timers.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}
