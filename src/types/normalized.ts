/**
 * Normalized domain types
 * These are the shapes the coordinator caches and hands out after parsing the
 * MELCloud Home user context. Every snapshot is rebuilt from scratch on each poll.
 */

import type {
  AtaFanSpeed,
  AtaOperationMode,
  AtaVaneHorizontal,
  AtaVaneVertical,
  AtwStatus,
  AtwTelemetryMeasure,
  AtwZoneMode,
} from '../constants.js'

export type UnitKind = 'air-to-air' | 'air-to-water'
export type ZoneNumber = 1 | 2

export interface TemperatureRange {
  min: number
  max: number
}

/**
 * Air-to-air capability flags and per-mode set-point limits
 */
export interface AtaCapabilities {
  numberOfFanSpeeds: number
  minTempHeat: number
  maxTempHeat: number
  minTempCoolDry: number
  maxTempCoolDry: number
  minTempAutomatic: number
  maxTempAutomatic: number
  hasHalfDegreeIncrements: boolean
  hasAutomaticFanSpeed: boolean
  hasSwing: boolean
  hasAirDirection: boolean
  hasCoolOperationMode: boolean
  hasHeatOperationMode: boolean
  hasAutoOperationMode: boolean
  hasDryOperationMode: boolean
  hasStandby: boolean
}

export interface AirToAirUnit {
  kind: 'air-to-air'
  id: string
  name: string
  power: boolean
  operationMode: AtaOperationMode
  setTemperature: number | null
  roomTemperature: number | null
  fanSpeed: AtaFanSpeed | null
  vaneVertical: AtaVaneVertical | null
  vaneHorizontal: AtaVaneHorizontal | null
  inStandbyMode: boolean
  isInError: boolean
  rssi: number | null
  // Filled in by the coordinator from the trend report, null until known
  outdoorTemperature: number | null
  capabilities: AtaCapabilities
}

/**
 * Air-to-water capabilities
 * Temperature ranges are always the safe hardcoded ones, never the reported ones
 */
export interface AtwCapabilities {
  hasHotWater: boolean
  hasZone2: boolean
  hasCoolingMode: boolean
  hasHalfDegrees: boolean
  hasThermostatZone1: boolean
  hasThermostatZone2: boolean
  hasHeatZone1: boolean
  hasHeatZone2: boolean
  ftcModel: number
  zoneTemperature: TemperatureRange
  tankTemperature: TemperatureRange
}

export interface AtwZone {
  // How the zone is heated when the valve serves it
  controlMode: AtwZoneMode
  setTemperature: number | null
  roomTemperature: number | null
}

export interface HotWater {
  setTemperature: number | null
  tankTemperature: number | null
  forcedHotWaterMode: boolean
}

export interface AirToWaterUnit {
  kind: 'air-to-water'
  id: string
  name: string
  power: boolean
  inStandbyMode: boolean
  // What the 3-way valve is doing now, after the forced hot water override
  status: AtwStatus
  // Raw OperationMode setting as reported
  reportedStatus: string
  zone1: AtwZone
  // Null when the unit has no second zone, or its data was missing from the last poll
  zone2: AtwZone | null
  hotWater: HotWater
  isInError: boolean
  errorCode: string | null
  rssi: number | null
  ftcModel: number
  holidayModeEnabled: boolean
  frostProtectionEnabled: boolean
  capabilities: AtwCapabilities
  // Latest flow and return temperatures, filled in by the coordinator, null until known
  telemetry: AtwTelemetry
}

export type AtwTelemetry = Record<AtwTelemetryMeasure, number | null>

export type Unit = AirToAirUnit | AirToWaterUnit

export interface Building {
  id: string
  name: string
  timezone: string | null
  airToAirUnits: AirToAirUnit[]
  airToWaterUnits: AirToWaterUnit[]
}

export type ZoneActivity = 'off' | 'heating' | 'idle'
export type ValveTarget = 'idle' | 'hot-water' | 'zone1' | 'zone2'
