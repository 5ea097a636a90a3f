/**
 * Compare two unit states and return the flattened differences
 */
export type StateDifference = { from: unknown; to: unknown }

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export function getStateDifferences<T extends object>(
  oldState: T | null,
  newState: T,
  ignoredKeys: readonly string[] = [],
): Record<string, StateDifference> {
  if (!oldState) {
    return {}
  }

  // Helper to check if a path should be ignored (exact match or parent match)
  const shouldIgnore = (path: string): boolean => {
    if (ignoredKeys.includes(path)) {
      return true
    }
    // "hotWater" ignores "hotWater.tankTemperature"
    const parts = path.split('.')
    for (let i = 1; i < parts.length; i++) {
      if (ignoredKeys.includes(parts.slice(0, i).join('.'))) {
        return true
      }
    }
    return false
  }

  const compareValues = (oldVal: unknown, newVal: unknown, path: string): Record<string, StateDifference> => {
    const diffs: Record<string, StateDifference> = {}

    // Normalize null/undefined
    const normalizedOld = oldVal ?? null
    const normalizedNew = newVal ?? null

    if (JSON.stringify(normalizedOld) === JSON.stringify(normalizedNew)) {
      return diffs
    }

    // If both are objects, recurse into them
    if (isRecord(normalizedOld) && isRecord(normalizedNew)) {
      const allKeys = new Set([...Object.keys(normalizedOld), ...Object.keys(normalizedNew)])
      for (const key of allKeys) {
        const fullPath = path ? `${path}.${key}` : key
        if (shouldIgnore(fullPath)) {
          continue
        }
        Object.assign(diffs, compareValues(normalizedOld[key], normalizedNew[key], fullPath))
      }
      return diffs
    }

    // Scalar value changed
    diffs[path] = { from: oldVal, to: newVal }
    return diffs
  }

  return compareValues(oldState, newState, '')
}

export function formatStateDifferences(differences: Record<string, StateDifference>): string {
  return Object.entries(differences)
    .map(([key, { from, to }]) => `\n  ${key}: ${from} → ${to}`)
    .join('')
}
