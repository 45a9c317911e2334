export interface Clock {
  now(): Date
}

/** Wraps a time source so it never goes backwards, e.g. across an NTP step. */
export function createMonotonicClock(source: () => Date = () => new Date()): Clock {
  let last = 0
  return {
    now() {
      last = Math.max(last, source().getTime())
      return new Date(last)
    },
  }
}

/** Second-precision UTC timestamp, e.g. 2026-03-14T09:26:53Z */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`
}

const CALENDAR_DAY = /^\d{4}-\d{2}-\d{2}$/

export function isCalendarDay(value: string): boolean {
  if (!CALENDAR_DAY.test(value)) return false
  const parsed = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value)
}
