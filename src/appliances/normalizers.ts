import {
  ATA_FAN_SPEED_BY_NUMBER,
  ATA_FAN_SPEEDS,
  ATA_VANE_HORIZONTAL,
  ATA_VANE_HORIZONTAL_ALIASES,
  ATA_VANE_VERTICAL,
  ATA_VANE_VERTICAL_BY_NUMBER,
  type AtaFanSpeed,
  type AtaVaneHorizontal,
  type AtaVaneVertical,
  isOneOf,
} from '../constants.js'
import type { Setting } from '../types/api.js'

/**
 * Utility functions for turning MELCloud Home wire values into typed values
 */

export type Settings = ReadonlyMap<string, string>

/**
 * Flatten the `{name, value}` settings list into a lookup. Null values become empty strings.
 */
export function parseSettings(settings: readonly Setting[]): Settings {
  const parsed = new Map<string, string>()
  for (const { name, value } of settings) {
    parsed.set(name, value === null || value === undefined ? '' : String(value))
  }
  return parsed
}

/**
 * Wire booleans are the strings "True"/"False", capabilities use native booleans
 */
export function parseBool(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value
  }
  if (value === null || value === undefined) {
    return false
  }
  return String(value).toLowerCase() === 'true'
}

/**
 * Like parseBool, but a missing value falls back to the given default
 */
export function parseFlag(value: unknown, fallback: boolean): boolean {
  return value === null || value === undefined ? fallback : parseBool(value)
}

export function parseNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === '' || typeof value === 'boolean') {
    return null
  }
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

export function parseInteger(value: unknown, fallback: number): number {
  const parsed = parseNumber(value)
  return parsed === null ? fallback : Math.trunc(parsed)
}

/**
 * HasZone2 arrives as "0"/"1" and occasionally as "False"/"True"
 */
export function parseZoneFlag(value: string | undefined): boolean {
  if (value === undefined || value === '') {
    return false
  }
  const normalized = value.toLowerCase()
  return normalized !== '0' && normalized !== 'false'
}

/**
 * Empty error codes mean "no error"
 */
export function parseErrorCode(value: string | undefined): string | null {
  return value ? value : null
}

/**
 * Normalize fan speed, handling firmware that reports "0".."5"
 */
export function normalizeFanSpeed(value: string | undefined): AtaFanSpeed | null {
  if (!value) {
    return null
  }
  if (isOneOf(ATA_FAN_SPEEDS, value)) {
    return value
  }
  return ATA_FAN_SPEED_BY_NUMBER[value] ?? null
}

/**
 * Normalize vertical vane position, handling numeric "0".."5" and "7" (swing)
 */
export function normalizeVaneVertical(value: string | undefined): AtaVaneVertical | null {
  if (!value) {
    return null
  }
  if (isOneOf(ATA_VANE_VERTICAL, value)) {
    return value
  }
  return ATA_VANE_VERTICAL_BY_NUMBER[value] ?? null
}

/**
 * Normalize horizontal vane position, mapping the American spellings
 */
export function normalizeVaneHorizontal(value: string | undefined): AtaVaneHorizontal | null {
  if (!value) {
    return null
  }
  if (isOneOf(ATA_VANE_HORIZONTAL, value)) {
    return value
  }
  return ATA_VANE_HORIZONTAL_ALIASES[value] ?? null
}
