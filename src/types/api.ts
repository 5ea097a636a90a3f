import { z } from 'zod'

// Wire shapes of the MELCloud Home web API. Everything that is not needed is passed through untouched.

export const SettingSchema = z.object({
  name: z.string(),
  value: z.union([z.string(), z.number(), z.boolean()]).nullable().optional(),
})

export type Setting = z.infer<typeof SettingSchema>

const ToggleSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .passthrough()

export const RawUnitSchema = z
  .object({
    id: z.string(),
    givenDisplayName: z.string().nullable().optional(),
    rssi: z.number().nullable().optional(),
    settings: z.array(SettingSchema).default([]),
    capabilities: z.record(z.unknown()).nullable().optional(),
    holidayMode: ToggleSchema.nullable().optional(),
    frostProtection: ToggleSchema.nullable().optional(),
  })
  .passthrough()

export type RawUnit = z.infer<typeof RawUnitSchema>

export const RawBuildingSchema = z
  .object({
    id: z.string(),
    name: z.string().nullable().optional(),
    timezone: z.string().nullable().optional(),
    airToAirUnits: z.array(RawUnitSchema).default([]),
    airToWaterUnits: z.array(RawUnitSchema).default([]),
  })
  .passthrough()

export type RawBuilding = z.infer<typeof RawBuildingSchema>

export const UserContextSchema = z
  .object({
    buildings: z.array(RawBuildingSchema).default([]),
    guestBuildings: z.array(RawBuildingSchema).default([]),
  })
  .passthrough()

export type UserContext = z.infer<typeof UserContextSchema>

export const TrendSummarySchema = z
  .object({
    datasets: z
      .array(
        z
          .object({
            label: z.string().default(''),
            data: z
              .array(
                z
                  .object({
                    x: z.string().optional(),
                    y: z.number().nullable().optional(),
                  })
                  .passthrough(),
              )
              .default([]),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough()

export type TrendSummary = z.infer<typeof TrendSummarySchema>

// Values arrive as strings ("45.2"), oldest first
export const TelemetryActualSchema = z
  .object({
    measureData: z
      .array(
        z
          .object({
            type: z.string().optional(),
            values: z
              .array(
                z
                  .object({
                    time: z.string(),
                    value: z.union([z.string(), z.number()]).nullable(),
                  })
                  .passthrough(),
              )
              .default([]),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough()

export type TelemetryActual = z.infer<typeof TelemetryActualSchema>

// Write bodies. Every control field is present on every write, untouched ones as null.

export type AtwUpdatePayload = {
  power: boolean | null
  setTankWaterTemperature: number | null
  forcedHotWaterMode: boolean | null
  setTemperatureZone1: number | null
  setTemperatureZone2: number | null
  operationModeZone1: string | null
  operationModeZone2: string | null
  inStandbyMode: boolean | null
  setHeatFlowTemperatureZone1: number | null
  setCoolFlowTemperatureZone1: number | null
  setHeatFlowTemperatureZone2: number | null
  setCoolFlowTemperatureZone2: number | null
}

export type AtaUpdatePayload = {
  power: boolean | null
  operationMode: string | null
  setFanSpeed: string | null
  vaneHorizontalDirection: string | null
  vaneVerticalDirection: string | null
  setTemperature: number | null
  temperatureIncrementOverride: number | null
  inStandbyMode: boolean | null
}
