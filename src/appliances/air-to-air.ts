import {
  ATA_FAN_SPEEDS,
  ATA_OPERATION_MODES,
  type AtaFanSpeed,
  type AtaOperationMode,
  type AtaVaneHorizontal,
  type AtaVaneVertical,
  isOneOf,
} from '../constants.js'
import type { AtaUpdatePayload, RawUnit } from '../types/api.js'
import type { AirToAirUnit, AtaCapabilities } from '../types/normalized.js'
import { BaseUnitModel } from './base.js'
import { field, fieldReader, type FieldTable } from './fields.js'
import {
  normalizeFanSpeed,
  normalizeVaneHorizontal,
  normalizeVaneVertical,
  parseBool,
  parseFlag,
  parseInteger,
  parseNumber,
  parseSettings,
} from './normalizers.js'

interface AtaSettingValues {
  power: boolean
  operationMode: AtaOperationMode
  setTemperature: number | null
  roomTemperature: number | null
  fanSpeed: AtaFanSpeed | null
  vaneVertical: AtaVaneVertical | null
  vaneHorizontal: AtaVaneHorizontal | null
  inStandbyMode: boolean
  isInError: boolean
}

const ATA_FIELDS: FieldTable<AtaSettingValues> = {
  power: field('Power', parseBool),
  operationMode: field('OperationMode', (raw) => (isOneOf(ATA_OPERATION_MODES, raw) ? raw : 'Heat')),
  setTemperature: field('SetTemperature', parseNumber),
  roomTemperature: field('RoomTemperature', parseNumber),
  fanSpeed: field('SetFanSpeed', normalizeFanSpeed),
  vaneVertical: field('VaneVerticalDirection', normalizeVaneVertical),
  vaneHorizontal: field('VaneHorizontalDirection', normalizeVaneHorizontal),
  inStandbyMode: field('InStandbyMode', parseBool),
  isInError: field('IsInError', parseBool),
}

export function parseAtaCapabilities(data: Record<string, unknown>): AtaCapabilities {
  return {
    numberOfFanSpeeds: parseInteger(data.numberOfFanSpeeds, 5),
    minTempHeat: parseNumber(data.minTempHeat) ?? 10,
    maxTempHeat: parseNumber(data.maxTempHeat) ?? 31,
    minTempCoolDry: parseNumber(data.minTempCoolDry) ?? 16,
    maxTempCoolDry: parseNumber(data.maxTempCoolDry) ?? 31,
    minTempAutomatic: parseNumber(data.minTempAutomatic) ?? 16,
    maxTempAutomatic: parseNumber(data.maxTempAutomatic) ?? 31,
    hasHalfDegreeIncrements: parseFlag(data.hasHalfDegreeIncrements, true),
    hasAutomaticFanSpeed: parseFlag(data.hasAutomaticFanSpeed, true),
    hasSwing: parseFlag(data.hasSwing, true),
    hasAirDirection: parseFlag(data.hasAirDirection, true),
    hasCoolOperationMode: parseFlag(data.hasCoolOperationMode, true),
    hasHeatOperationMode: parseFlag(data.hasHeatOperationMode, true),
    hasAutoOperationMode: parseFlag(data.hasAutoOperationMode, true),
    hasDryOperationMode: parseFlag(data.hasDryOperationMode, true),
    hasStandby: parseFlag(data.hasStandby, false),
  }
}

/**
 * Operation modes the unit accepts. Fan only is always available.
 */
export function getSupportedModes(capabilities: AtaCapabilities): AtaOperationMode[] {
  const supported: Record<AtaOperationMode, boolean> = {
    Heat: capabilities.hasHeatOperationMode,
    Cool: capabilities.hasCoolOperationMode,
    Automatic: capabilities.hasAutoOperationMode,
    Dry: capabilities.hasDryOperationMode,
    Fan: true,
  }
  return ATA_OPERATION_MODES.filter((mode) => supported[mode])
}

/**
 * Fan speeds the unit accepts, limited by its number of speeds
 */
export function getSupportedFanSpeeds(capabilities: AtaCapabilities): AtaFanSpeed[] {
  return ATA_FAN_SPEEDS.filter((speed, index) => {
    if (speed === 'Auto') {
      return capabilities.hasAutomaticFanSpeed
    }
    return index <= capabilities.numberOfFanSpeeds
  })
}

/**
 * Air-to-air split system air conditioner
 */
export class AirToAirModel extends BaseUnitModel<AirToAirUnit, AtaUpdatePayload> {
  readonly kind = 'air-to-air' as const

  public endpoint(unitId: string): string {
    return `/api/ataunit/${unitId}`
  }

  public emptyPayload(): AtaUpdatePayload {
    return {
      power: null,
      operationMode: null,
      setFanSpeed: null,
      vaneHorizontalDirection: null,
      vaneVerticalDirection: null,
      setTemperature: null,
      temperatureIncrementOverride: null,
      inStandbyMode: null,
    }
  }

  public parse(raw: RawUnit): AirToAirUnit {
    const fields = fieldReader(ATA_FIELDS, parseSettings(raw.settings))

    return {
      kind: this.kind,
      id: raw.id,
      name: this.getUnitName(raw, 'Air conditioner'),
      power: fields.read('power'),
      operationMode: fields.read('operationMode'),
      setTemperature: fields.read('setTemperature'),
      roomTemperature: fields.read('roomTemperature'),
      fanSpeed: fields.read('fanSpeed'),
      vaneVertical: fields.read('vaneVertical'),
      vaneHorizontal: fields.read('vaneHorizontal'),
      inStandbyMode: fields.read('inStandbyMode'),
      isInError: fields.read('isInError'),
      rssi: raw.rssi ?? null,
      outdoorTemperature: null,
      capabilities: parseAtaCapabilities(this.getRawCapabilities(raw)),
    }
  }
}

export const airToAirModel = new AirToAirModel()
