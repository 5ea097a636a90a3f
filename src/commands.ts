import { getSupportedFanSpeeds, getSupportedModes } from './appliances/air-to-air.js'
import { getZone } from './appliances/air-to-water.js'
import {
  assertOneOf,
  validateAtaTemperature,
  validateTankTemperature,
  validateZone,
  validateZoneTemperature,
} from './appliances/validation.js'
import type { ControlClient } from './client.js'
import {
  ATA_FAN_SPEEDS,
  ATA_OPERATION_MODES,
  ATA_VANE_HORIZONTAL,
  ATA_VANE_VERTICAL,
  type AtaFanSpeed,
  type AtaOperationMode,
  type AtaVaneHorizontal,
  type AtaVaneVertical,
  ATW_ZONE_MODES,
  type AtwZoneMode,
} from './constants.js'
import { ValidationError } from './errors.js'
import type { Session } from './session.js'
import type { AirToAirUnit, AirToWaterUnit, UnitKind, ZoneNumber } from './types/normalized.js'

/**
 * Control requests for air-to-water units
 */
export type AtwCommand =
  | { type: 'SetAtwPower'; unitId: string; value: boolean }
  | { type: 'SetAtwStandby'; unitId: string; value: boolean }
  | { type: 'SetZoneTemperature'; unitId: string; zone: ZoneNumber; value: number }
  | { type: 'SetZoneMode'; unitId: string; zone: ZoneNumber; value: AtwZoneMode }
  | { type: 'SetDhwTemperature'; unitId: string; value: number }
  | { type: 'SetForcedHotWater'; unitId: string; value: boolean }

/**
 * Control requests for air-to-air units
 */
export type AtaCommand =
  | { type: 'SetAtaPower'; unitId: string; value: boolean }
  | { type: 'SetAtaStandby'; unitId: string; value: boolean }
  | { type: 'SetAtaTemperature'; unitId: string; value: number }
  | { type: 'SetAtaMode'; unitId: string; value: AtaOperationMode }
  | { type: 'SetAtaFanSpeed'; unitId: string; value: AtaFanSpeed }
  | { type: 'SetAtaVanes'; unitId: string; vertical: AtaVaneVertical; horizontal: AtaVaneHorizontal }

export type ControlCommand = AtwCommand | AtaCommand
export type ControlCommandType = ControlCommand['type']

const ATW_COMMAND_TYPES: ReadonlySet<ControlCommandType> = new Set<AtwCommand['type']>([
  'SetAtwPower',
  'SetAtwStandby',
  'SetZoneTemperature',
  'SetZoneMode',
  'SetDhwTemperature',
  'SetForcedHotWater',
])

export function isAtwCommand(command: ControlCommand): command is AtwCommand {
  return ATW_COMMAND_TYPES.has(command.type)
}

export function commandTarget(command: ControlCommand): UnitKind {
  return isAtwCommand(command) ? 'air-to-water' : 'air-to-air'
}

/**
 * Short human readable form for logs
 */
export function describeCommand(command: ControlCommand): string {
  switch (command.type) {
    case 'SetZoneTemperature':
    case 'SetZoneMode':
      return `${command.type}(zone ${command.zone}, ${command.value})`
    case 'SetAtaVanes':
      return `${command.type}(${command.vertical}, ${command.horizontal})`
    default:
      return `${command.type}(${command.value})`
  }
}

/**
 * Range and enum checks, the same ones the client applies before writing
 */
export function validateCommand(command: ControlCommand): void {
  switch (command.type) {
    case 'SetZoneTemperature':
      validateZone(command.zone)
      validateZoneTemperature(command.value, command.zone)
      return
    case 'SetZoneMode':
      validateZone(command.zone)
      assertOneOf(ATW_ZONE_MODES, command.value, `zone ${command.zone} mode`)
      return
    case 'SetDhwTemperature':
      validateTankTemperature(command.value)
      return
    case 'SetAtaTemperature':
      validateAtaTemperature(command.value)
      return
    case 'SetAtaMode':
      assertOneOf(ATA_OPERATION_MODES, command.value, 'operation mode')
      return
    case 'SetAtaFanSpeed':
      assertOneOf(ATA_FAN_SPEEDS, command.value, 'fan speed')
      return
    case 'SetAtaVanes':
      assertOneOf(ATA_VANE_VERTICAL, command.vertical, 'vertical vane direction')
      assertOneOf(ATA_VANE_HORIZONTAL, command.horizontal, 'horizontal vane direction')
      return
    default:
      return
  }
}

/**
 * True when the cached unit already has the requested value
 */
export function isAtwCommandApplied(command: AtwCommand, unit: AirToWaterUnit): boolean {
  switch (command.type) {
    case 'SetAtwPower':
      return unit.power === command.value
    case 'SetAtwStandby':
      return unit.inStandbyMode === command.value
    case 'SetZoneTemperature':
      return getZone(unit, command.zone)?.setTemperature === command.value
    case 'SetZoneMode':
      return getZone(unit, command.zone)?.controlMode === command.value
    case 'SetDhwTemperature':
      return unit.hotWater.setTemperature === command.value
    case 'SetForcedHotWater':
      return unit.hotWater.forcedHotWaterMode === command.value
  }
}

export function isAtaCommandApplied(command: AtaCommand, unit: AirToAirUnit): boolean {
  switch (command.type) {
    case 'SetAtaPower':
      return unit.power === command.value
    case 'SetAtaStandby':
      return unit.inStandbyMode === command.value
    case 'SetAtaTemperature':
      return unit.setTemperature === command.value
    case 'SetAtaMode':
      return unit.operationMode === command.value
    case 'SetAtaFanSpeed':
      return unit.fanSpeed === command.value
    case 'SetAtaVanes':
      return unit.vaneVertical === command.vertical && unit.vaneHorizontal === command.horizontal
  }
}

/**
 * Capability preconditions, checked against the cached unit before any network call
 */
export function assertAtwCommandSupported(command: AtwCommand, unit: AirToWaterUnit): void {
  switch (command.type) {
    case 'SetZoneTemperature':
    case 'SetZoneMode':
      if (command.zone === 2 && !unit.zone2) {
        throw new ValidationError(`Unit ${unit.name} has no zone 2`)
      }
      return
    case 'SetDhwTemperature':
    case 'SetForcedHotWater':
      if (!unit.capabilities.hasHotWater) {
        throw new ValidationError(`Unit ${unit.name} has no hot water tank`)
      }
      return
    default:
      return
  }
}

export function assertAtaCommandSupported(command: AtaCommand, unit: AirToAirUnit): void {
  const { capabilities } = unit
  switch (command.type) {
    case 'SetAtaMode':
      if (!getSupportedModes(capabilities).includes(command.value)) {
        throw new ValidationError(`Unit ${unit.name} does not support operation mode ${command.value}`)
      }
      return
    case 'SetAtaFanSpeed':
      if (!getSupportedFanSpeeds(capabilities).includes(command.value)) {
        throw new ValidationError(`Unit ${unit.name} does not support fan speed ${command.value}`)
      }
      return
    case 'SetAtaVanes':
      if ((command.vertical === 'Swing' || command.horizontal === 'Swing') && !capabilities.hasSwing) {
        throw new ValidationError(`Unit ${unit.name} does not support swing`)
      }
      return
    case 'SetAtaStandby':
      if (!capabilities.hasStandby) {
        throw new ValidationError(`Unit ${unit.name} does not support standby`)
      }
      return
    default:
      return
  }
}

/**
 * Issue the client write that carries out a command
 */
export async function sendCommand(client: ControlClient, session: Session, command: ControlCommand): Promise<void> {
  switch (command.type) {
    case 'SetAtwPower':
      return client.setAtwPower(session, command.unitId, command.value)
    case 'SetAtwStandby':
      return client.setAtwStandby(session, command.unitId, command.value)
    case 'SetZoneTemperature':
      return client.setZoneTemperature(session, command.unitId, command.zone, command.value)
    case 'SetZoneMode':
      return client.setZoneMode(session, command.unitId, command.zone, command.value)
    case 'SetDhwTemperature':
      return client.setDhwTemperature(session, command.unitId, command.value)
    case 'SetForcedHotWater':
      return client.setForcedHotWater(session, command.unitId, command.value)
    case 'SetAtaPower':
      return client.setAtaPower(session, command.unitId, command.value)
    case 'SetAtaStandby':
      return client.setAtaStandby(session, command.unitId, command.value)
    case 'SetAtaTemperature':
      return client.setAtaTemperature(session, command.unitId, command.value)
    case 'SetAtaMode':
      return client.setAtaMode(session, command.unitId, command.value)
    case 'SetAtaFanSpeed':
      return client.setAtaFanSpeed(session, command.unitId, command.value)
    case 'SetAtaVanes':
      return client.setAtaVanes(session, command.unitId, command.vertical, command.horizontal)
  }
}
