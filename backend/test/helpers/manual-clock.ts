import { addDays, type Clock } from '../../src/shared/time/clock';

export type ManualClock = {
  clock: Clock;
  now(): Date;
  set(date: Date): void;
  advanceDays(days: number): void;
  advanceMs(ms: number): void;
};

/** A clock that only moves when the test says so. */
export function createManualClock(start = new Date('2026-01-01T09:00:00.000Z')): ManualClock {
  let current = start;

  return {
    clock: () => current,
    now: () => current,
    set(date) {
      current = date;
    },
    advanceDays(days) {
      current = addDays(current, days);
    },
    advanceMs(ms) {
      current = new Date(current.getTime() + ms);
    },
  };
}
