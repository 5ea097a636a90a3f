import {
  ATA_TEMPERATURE_RANGE,
  ATW_TANK_TEMPERATURE_RANGE,
  ATW_ZONE_TEMPERATURE_RANGE,
  TEMPERATURE_STEP,
} from '../constants.js'
import { ValidationError } from '../errors.js'
import type { TemperatureRange } from '../types/normalized.js'

export function assertTemperature(
  value: number,
  range: TemperatureRange,
  label: string,
  step: number | null = TEMPERATURE_STEP,
): void {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${label} must be a number, got ${value}`)
  }
  if (value < range.min || value > range.max) {
    throw new ValidationError(`${label} ${value}°C is outside the allowed range ${range.min}-${range.max}°C`)
  }
  if (step === null) {
    return
  }
  const steps = value / step
  if (Math.abs(steps - Math.round(steps)) > 1e-9) {
    throw new ValidationError(`${label} ${value}°C must be a multiple of ${step}°C`)
  }
}

export function assertOneOf<T extends string>(values: readonly T[], value: string, label: string): asserts value is T {
  if (!values.some((candidate) => candidate === value)) {
    throw new ValidationError(`Invalid ${label} "${value}", expected one of: ${values.join(', ')}`)
  }
}

export function validateZone(zone: number): void {
  if (zone !== 1 && zone !== 2) {
    throw new ValidationError(`Zone must be 1 or 2, got ${zone}`)
  }
}

export function validateZoneTemperature(temperature: number, zone: number): void {
  assertTemperature(temperature, ATW_ZONE_TEMPERATURE_RANGE, `Zone ${zone} temperature`)
}

export function validateTankTemperature(temperature: number): void {
  assertTemperature(temperature, ATW_TANK_TEMPERATURE_RANGE, 'Tank temperature')
}

/**
 * Step is left to the unit, some only take whole degrees
 */
export function validateAtaTemperature(temperature: number): void {
  assertTemperature(temperature, ATA_TEMPERATURE_RANGE, 'Temperature', null)
}
