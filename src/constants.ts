export const BASE_URL = 'https://melcloudhome.com'
export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36'

// Air-to-air
export const ATA_OPERATION_MODES = ['Heat', 'Cool', 'Automatic', 'Dry', 'Fan'] as const
export type AtaOperationMode = (typeof ATA_OPERATION_MODES)[number]

export const ATA_FAN_SPEEDS = ['Auto', 'One', 'Two', 'Three', 'Four', 'Five'] as const
export type AtaFanSpeed = (typeof ATA_FAN_SPEEDS)[number]

export const ATA_VANE_VERTICAL = ['Auto', 'Swing', 'One', 'Two', 'Three', 'Four', 'Five'] as const
export type AtaVaneVertical = (typeof ATA_VANE_VERTICAL)[number]

export const ATA_VANE_HORIZONTAL = ['Auto', 'Swing', 'Left', 'LeftCentre', 'Centre', 'RightCentre', 'Right'] as const
export type AtaVaneHorizontal = (typeof ATA_VANE_HORIZONTAL)[number]

// Some firmware reports fan speed and vertical vane as numeric strings
export const ATA_FAN_SPEED_BY_NUMBER: Record<string, AtaFanSpeed> = {
  '0': 'Auto',
  '1': 'One',
  '2': 'Two',
  '3': 'Three',
  '4': 'Four',
  '5': 'Five',
}

export const ATA_VANE_VERTICAL_BY_NUMBER: Record<string, AtaVaneVertical> = {
  '0': 'Auto',
  '1': 'One',
  '2': 'Two',
  '3': 'Three',
  '4': 'Four',
  '5': 'Five',
  '7': 'Swing',
}

export const ATA_VANE_VERTICAL_TO_NUMBER: Record<AtaVaneVertical, string> = {
  Auto: '0',
  One: '1',
  Two: '2',
  Three: '3',
  Four: '4',
  Five: '5',
  Swing: '7',
}

export const ATA_VANE_HORIZONTAL_ALIASES: Record<string, AtaVaneHorizontal> = {
  CenterLeft: 'LeftCentre',
  Center: 'Centre',
  CenterRight: 'RightCentre',
}

export const ATA_TEMPERATURE_RANGE = { min: 10, max: 31 } as const

// Air-to-water
// Measures of /api/telemetry/actual/{unitId}, the wire names are snake_case
export const ATW_TELEMETRY_MEASURES = [
  'flow_temperature',
  'return_temperature',
  'flow_temperature_zone1',
  'return_temperature_zone1',
  'flow_temperature_boiler',
  'return_temperature_boiler',
] as const
export type AtwTelemetryMeasure = (typeof ATW_TELEMETRY_MEASURES)[number]

export const ATW_ZONE_MODES = ['HeatRoomTemperature', 'HeatFlowTemperature', 'HeatCurve'] as const
export type AtwZoneMode = (typeof ATW_ZONE_MODES)[number]

export const ATW_STATUS_STOP = 'Stop'
export const ATW_STATUS_HOT_WATER = 'HotWater'
export type AtwStatus = typeof ATW_STATUS_STOP | typeof ATW_STATUS_HOT_WATER | AtwZoneMode

// Reported bounds are unreliable, these are always used instead
export const ATW_ZONE_TEMPERATURE_RANGE = { min: 10, max: 30 } as const
export const ATW_TANK_TEMPERATURE_RANGE = { min: 40, max: 60 } as const

export const TEMPERATURE_STEP = 0.5
export const VALVE_HYSTERESIS = 0.5 // °C below set-point before a zone counts as calling for heat
export const DEFAULT_FTC_MODEL = 3

export const isOneOf = <T extends string>(values: readonly T[], value: unknown): value is T =>
  values.some((candidate) => candidate === value)
