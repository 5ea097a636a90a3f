import type { Settings } from './normalizers.js'

/**
 * One entry of a settings field table: the wire name and a typed parser for its value
 */
export interface FieldSpec<T> {
  readonly name: string
  readonly parse: (raw: string | undefined) => T
}

/**
 * Maps every property of T to the wire field it is read from.
 * Leaving a property out of a table is a compile error.
 */
export type FieldTable<T> = { readonly [K in keyof T]-?: FieldSpec<T[K]> }

export const field = <T>(name: string, parse: (raw: string | undefined) => T): FieldSpec<T> => ({ name, parse })

/**
 * Bind a field table to one unit's settings
 */
export function fieldReader<T>(table: FieldTable<T>, settings: Settings) {
  return {
    read<K extends keyof T>(key: K): T[K] {
      const spec: FieldSpec<T[K]> = table[key]
      return spec.parse(settings.get(spec.name))
    },
    has(key: keyof T): boolean {
      return settings.has(table[key].name)
    },
  }
}
