import { getValveTarget } from './appliances/air-to-water.js'
import type { SyncCoordinator } from './coordinator.js'
import type { SessionState } from './session.js'
import type { AtwTelemetry, ValveTarget } from './types/normalized.js'

export interface AtaDiagnostics {
  id: string
  name: string
  power: boolean
  operationMode: string
  setTemperature: number | null
  roomTemperature: number | null
  outdoorTemperature: number | null
  isInError: boolean
  rssi: number | null
}

export interface AtwDiagnostics {
  id: string
  name: string
  power: boolean
  status: string
  reportedStatus: string
  valveTarget: ValveTarget
  hasZone2: boolean
  forcedHotWaterMode: boolean
  isInError: boolean
  errorCode: string | null
  ftcModel: number
  rssi: number | null
  telemetry: AtwTelemetry
}

export interface Diagnostics {
  account: string
  session: SessionState
  lastUpdateSucceeded: boolean
  lastUpdateAt: string | null
  consecutiveFailures: number
  stale: boolean
  buildings: {
    id: string
    name: string
    airToAirUnits: AtaDiagnostics[]
    airToWaterUnits: AtwDiagnostics[]
  }[]
}

/**
 * Keep the first character of the local part and the whole domain: j***@example.com
 */
export function redactEmail(email: string): string {
  const at = email.lastIndexOf('@')
  if (at < 1) {
    return '***'
  }
  return `${email[0]}***${email.slice(at)}`
}

/**
 * JSON-safe summary of the coordinator state for bug reports
 */
export function buildDiagnostics(coordinator: SyncCoordinator): Diagnostics {
  return {
    account: redactEmail(coordinator.email),
    session: coordinator.sessionState,
    lastUpdateSucceeded: coordinator.lastUpdateSucceeded,
    lastUpdateAt: coordinator.lastUpdateAt?.toISOString() ?? null,
    consecutiveFailures: coordinator.consecutiveFailures,
    stale: coordinator.isStale(),
    buildings: coordinator.snapshot.map((building) => ({
      id: building.id,
      name: building.name,
      airToAirUnits: building.airToAirUnits.map((unit) => ({
        id: unit.id,
        name: unit.name,
        power: unit.power,
        operationMode: unit.operationMode,
        setTemperature: unit.setTemperature,
        roomTemperature: unit.roomTemperature,
        outdoorTemperature: unit.outdoorTemperature,
        isInError: unit.isInError,
        rssi: unit.rssi,
      })),
      airToWaterUnits: building.airToWaterUnits.map((unit) => ({
        id: unit.id,
        name: unit.name,
        power: unit.power,
        status: unit.status,
        reportedStatus: unit.reportedStatus,
        valveTarget: getValveTarget(unit),
        hasZone2: unit.zone2 !== null,
        forcedHotWaterMode: unit.hotWater.forcedHotWaterMode,
        isInError: unit.isInError,
        errorCode: unit.errorCode,
        ftcModel: unit.ftcModel,
        rssi: unit.rssi,
        telemetry: { ...unit.telemetry },
      })),
    })),
  }
}
