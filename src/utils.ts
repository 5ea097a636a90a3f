/**
 * Last 8 characters of a unit id, enough to tell units apart in logs
 */
export const shortId = (id: string): string => (id.length > 8 ? id.slice(-8) : id)

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Recursively freeze a value so consumers of a snapshot cannot mutate it
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
  }
  return value
}

/**
 * Format a date the way the trend report endpoint expects: 2024-01-31T12:00:00.0000000
 */
export function formatApiDate(date: Date): string {
  return `${date.toISOString().slice(0, 19)}.0000000`
}

/**
 * Minute precision in UTC, as the telemetry endpoint takes it: 2024-01-31 12:00
 */
export function formatTelemetryDate(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ')
}
