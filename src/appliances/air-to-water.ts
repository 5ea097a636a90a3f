import {
  ATW_STATUS_HOT_WATER,
  ATW_STATUS_STOP,
  ATW_TANK_TEMPERATURE_RANGE,
  ATW_ZONE_MODES,
  ATW_ZONE_TEMPERATURE_RANGE,
  type AtwStatus,
  type AtwZoneMode,
  DEFAULT_FTC_MODEL,
  isOneOf,
  VALVE_HYSTERESIS,
} from '../constants.js'
import createLogger from '../logger.js'
import type { AtwUpdatePayload, RawUnit } from '../types/api.js'
import type {
  AirToWaterUnit,
  AtwCapabilities,
  AtwTelemetry,
  AtwZone,
  HotWater,
  ValveTarget,
  ZoneActivity,
  ZoneNumber,
} from '../types/normalized.js'
import { shortId } from '../utils.js'
import { BaseUnitModel } from './base.js'
import { field, fieldReader, type FieldTable } from './fields.js'
import {
  parseBool,
  parseErrorCode,
  parseFlag,
  parseInteger,
  parseNumber,
  parseSettings,
  parseZoneFlag,
  type Settings,
} from './normalizers.js'

const logger = createLogger('air-to-water')

const parseZoneMode = (raw: string | undefined): AtwZoneMode | null => (isOneOf(ATW_ZONE_MODES, raw) ? raw : null)

interface AtwSettingValues {
  power: boolean
  inStandbyMode: boolean
  operationMode: string
  operationModeZone1: AtwZoneMode | null
  setTemperatureZone1: number | null
  roomTemperatureZone1: number | null
  hasZone2: boolean
  setTankWaterTemperature: number | null
  tankWaterTemperature: number | null
  forcedHotWaterMode: boolean
  isInError: boolean
  errorCode: string | null
  ftcModel: number
  hasCoolingMode: boolean
}

const ATW_FIELDS: FieldTable<AtwSettingValues> = {
  power: field('Power', parseBool),
  inStandbyMode: field('InStandbyMode', parseBool),
  operationMode: field('OperationMode', (raw) => raw || ATW_STATUS_STOP),
  operationModeZone1: field('OperationModeZone1', parseZoneMode),
  setTemperatureZone1: field('SetTemperatureZone1', parseNumber),
  roomTemperatureZone1: field('RoomTemperatureZone1', parseNumber),
  hasZone2: field('HasZone2', parseZoneFlag),
  setTankWaterTemperature: field('SetTankWaterTemperature', parseNumber),
  tankWaterTemperature: field('TankWaterTemperature', parseNumber),
  forcedHotWaterMode: field('ForcedHotWaterMode', parseBool),
  isInError: field('IsInError', parseBool),
  errorCode: field('ErrorCode', parseErrorCode),
  ftcModel: field('FTCModel', (raw) => parseInteger(raw, DEFAULT_FTC_MODEL)),
  hasCoolingMode: field('HasCoolingMode', parseBool),
}

interface AtwZone2Values {
  operationModeZone2: AtwZoneMode | null
  setTemperatureZone2: number | null
  roomTemperatureZone2: number | null
}

const ATW_ZONE2_FIELDS: FieldTable<AtwZone2Values> = {
  operationModeZone2: field('OperationModeZone2', parseZoneMode),
  setTemperatureZone2: field('SetTemperatureZone2', parseNumber),
  roomTemperatureZone2: field('RoomTemperatureZone2', parseNumber),
}

/**
 * Parse capabilities, always substituting the safe temperature ranges
 */
export function parseAtwCapabilities(
  data: Record<string, unknown>,
  options: { hasZone2: boolean; coolingFromSettings: boolean; unitId: string },
): AtwCapabilities {
  const reportedZoneMin = parseNumber(data.minSetTemperature)
  const reportedZoneMax = parseNumber(data.maxSetTemperature)
  const reportedTankMin = parseNumber(data.minSetTankTemperature)
  const reportedTankMax = parseNumber(data.maxSetTankTemperature)

  if (
    (reportedZoneMin !== null && reportedZoneMin !== ATW_ZONE_TEMPERATURE_RANGE.min) ||
    (reportedZoneMax !== null && reportedZoneMax !== ATW_ZONE_TEMPERATURE_RANGE.max)
  ) {
    logger.debug(
      `[${shortId(options.unitId)}] Reported zone range ${reportedZoneMin}-${reportedZoneMax}°C, using ${ATW_ZONE_TEMPERATURE_RANGE.min}-${ATW_ZONE_TEMPERATURE_RANGE.max}°C`,
    )
  }
  if (
    (reportedTankMin !== null && reportedTankMin !== ATW_TANK_TEMPERATURE_RANGE.min) ||
    (reportedTankMax !== null && reportedTankMax !== ATW_TANK_TEMPERATURE_RANGE.max)
  ) {
    logger.debug(
      `[${shortId(options.unitId)}] Reported tank range ${reportedTankMin}-${reportedTankMax}°C, using ${ATW_TANK_TEMPERATURE_RANGE.min}-${ATW_TANK_TEMPERATURE_RANGE.max}°C`,
    )
  }

  return {
    hasHotWater: parseFlag(data.hasHotWater, true),
    hasZone2: options.hasZone2,
    // Some units only report cooling support in the settings list
    hasCoolingMode: options.coolingFromSettings || parseFlag(data.hasCoolingMode, false),
    hasHalfDegrees: parseFlag(data.hasHalfDegrees, false),
    hasThermostatZone1: parseFlag(data.hasThermostatZone1, true),
    hasThermostatZone2: parseFlag(data.hasThermostatZone2, true),
    hasHeatZone1: parseFlag(data.hasHeatZone1, true),
    hasHeatZone2: parseFlag(data.hasHeatZone2, false),
    ftcModel: parseInteger(data.ftcModel, DEFAULT_FTC_MODEL),
    zoneTemperature: { ...ATW_ZONE_TEMPERATURE_RANGE },
    tankTemperature: { ...ATW_TANK_TEMPERATURE_RANGE },
  }
}

/**
 * Resolve what the 3-way valve is doing from the reported OperationMode.
 * Forced hot water wins until the tank reaches its set-point.
 */
export function deriveOperationStatus(
  reported: string,
  power: boolean,
  hotWater: HotWater,
  unitId = '',
): AtwStatus {
  if (!power) {
    return ATW_STATUS_STOP
  }

  if (hotWater.forcedHotWaterMode) {
    const { tankTemperature, setTemperature } = hotWater
    if (tankTemperature === null || setTemperature === null || tankTemperature < setTemperature) {
      return ATW_STATUS_HOT_WATER
    }
  }

  if (reported === ATW_STATUS_STOP || reported === ATW_STATUS_HOT_WATER || isOneOf(ATW_ZONE_MODES, reported)) {
    return reported
  }

  logger.warn(`[${shortId(unitId)}] Unknown operation status "${reported}", treating as ${ATW_STATUS_STOP}`)
  return ATW_STATUS_STOP
}

export function getZone(unit: AirToWaterUnit, zone: ZoneNumber): AtwZone | null {
  return zone === 1 ? unit.zone1 : unit.zone2
}

/**
 * A zone is heating only when the valve serves it and it is below set-point by more than the hysteresis.
 * When both zones share the active control mode, zone 1 takes precedence.
 */
export function isZoneActive(unit: AirToWaterUnit, zone: ZoneNumber): boolean {
  const data = getZone(unit, zone)
  if (!data || !unit.power || unit.status !== data.controlMode) {
    return false
  }
  if (data.roomTemperature === null || data.setTemperature === null) {
    return false
  }
  if (!(data.roomTemperature < data.setTemperature - VALVE_HYSTERESIS)) {
    return false
  }
  return zone === 1 || !isZoneActive(unit, 1)
}

export function isHotWaterActive(unit: AirToWaterUnit): boolean {
  return unit.power && unit.status === ATW_STATUS_HOT_WATER
}

export function getZoneActivity(unit: AirToWaterUnit, zone: ZoneNumber): ZoneActivity {
  if (!unit.power || !getZone(unit, zone)) {
    return 'off'
  }
  return isZoneActive(unit, zone) ? 'heating' : 'idle'
}

export function emptyTelemetry(): AtwTelemetry {
  return {
    flow_temperature: null,
    return_temperature: null,
    flow_temperature_zone1: null,
    return_temperature_zone1: null,
    flow_temperature_boiler: null,
    return_temperature_boiler: null,
  }
}

export function getValveTarget(unit: AirToWaterUnit): ValveTarget {
  if (isHotWaterActive(unit)) {
    return 'hot-water'
  }
  if (isZoneActive(unit, 1)) {
    return 'zone1'
  }
  if (isZoneActive(unit, 2)) {
    return 'zone2'
  }
  return 'idle'
}

/**
 * Air-to-water heat pump: one or two heating zones plus a hot water tank behind a 3-way valve
 */
export class AirToWaterModel extends BaseUnitModel<AirToWaterUnit, AtwUpdatePayload> {
  readonly kind = 'air-to-water' as const

  public endpoint(unitId: string): string {
    return `/api/atwunit/${unitId}`
  }

  public emptyPayload(): AtwUpdatePayload {
    return {
      power: null,
      setTankWaterTemperature: null,
      forcedHotWaterMode: null,
      setTemperatureZone1: null,
      setTemperatureZone2: null,
      operationModeZone1: null,
      operationModeZone2: null,
      inStandbyMode: null,
      setHeatFlowTemperatureZone1: null,
      setCoolFlowTemperatureZone1: null,
      setHeatFlowTemperatureZone2: null,
      setCoolFlowTemperatureZone2: null,
    }
  }

  public parse(raw: RawUnit): AirToWaterUnit {
    const settings = parseSettings(raw.settings)
    const fields = fieldReader(ATW_FIELDS, settings)
    const rawCapabilities = this.getRawCapabilities(raw)

    const hasZone2 = fields.has('hasZone2') ? fields.read('hasZone2') : parseFlag(rawCapabilities.hasZone2, false)
    const capabilities = parseAtwCapabilities(rawCapabilities, {
      hasZone2,
      coolingFromSettings: fields.read('hasCoolingMode'),
      unitId: raw.id,
    })

    const hotWater: HotWater = {
      setTemperature: fields.read('setTankWaterTemperature'),
      tankTemperature: fields.read('tankWaterTemperature'),
      forcedHotWaterMode: fields.read('forcedHotWaterMode'),
    }

    const power = fields.read('power')
    const reportedStatus = fields.read('operationMode')

    return {
      kind: this.kind,
      id: raw.id,
      name: this.getUnitName(raw, 'Heat pump'),
      power,
      inStandbyMode: fields.read('inStandbyMode'),
      status: deriveOperationStatus(reportedStatus, power, hotWater, raw.id),
      reportedStatus,
      zone1: {
        controlMode: fields.read('operationModeZone1') ?? 'HeatRoomTemperature',
        setTemperature: fields.read('setTemperatureZone1'),
        roomTemperature: fields.read('roomTemperatureZone1'),
      },
      zone2: hasZone2 ? this.parseZone2(raw.id, settings) : null,
      hotWater,
      isInError: fields.read('isInError'),
      errorCode: fields.read('errorCode'),
      rssi: raw.rssi ?? null,
      ftcModel: fields.read('ftcModel'),
      holidayModeEnabled: raw.holidayMode?.enabled ?? false,
      frostProtectionEnabled: raw.frostProtection?.enabled ?? false,
      capabilities,
      telemetry: emptyTelemetry(),
    }
  }

  /**
   * Zone 2 flagged present but without a usable control mode is treated as absent for this poll
   */
  private parseZone2(unitId: string, settings: Settings): AtwZone | null {
    const fields = fieldReader(ATW_ZONE2_FIELDS, settings)
    const controlMode = fields.read('operationModeZone2')
    if (!controlMode) {
      logger.warn(`[${shortId(unitId)}] Unit reports a second zone but its zone 2 data is missing, ignoring zone 2`)
      return null
    }
    return {
      controlMode,
      setTemperature: fields.read('setTemperatureZone2'),
      roomTemperature: fields.read('roomTemperatureZone2'),
    }
  }
}

export const airToWaterModel = new AirToWaterModel()
