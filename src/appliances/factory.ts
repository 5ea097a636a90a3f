import createLogger from '../logger.js'
import type { RawBuilding, UserContext } from '../types/api.js'
import type { Building } from '../types/normalized.js'
import { airToAirModel } from './air-to-air.js'
import { airToWaterModel } from './air-to-water.js'

const logger = createLogger('factory')

/**
 * Builds the domain snapshot from a MELCloud Home user context
 * Owned and guest buildings are both included, each unit parsed by the model of its family
 */
export class BuildingFactory {
  /**
   * Create a building with all of its units
   */
  public static create(raw: RawBuilding): Building {
    return {
      id: raw.id,
      name: raw.name?.trim() || 'Home',
      timezone: raw.timezone ?? null,
      airToAirUnits: raw.airToAirUnits.map((unit) => airToAirModel.parse(unit)),
      airToWaterUnits: raw.airToWaterUnits.map((unit) => airToWaterModel.parse(unit)),
    }
  }

  /**
   * Create every building of the user context, guest buildings after owned ones
   */
  public static fromUserContext(context: UserContext): Building[] {
    const buildings: Building[] = []
    const seen = new Set<string>()

    for (const raw of [...context.buildings, ...context.guestBuildings]) {
      if (seen.has(raw.id)) {
        logger.debug(`Building ${raw.id} listed twice in the user context, keeping the first`)
        continue
      }
      seen.add(raw.id)
      buildings.push(BuildingFactory.create(raw))
    }

    logger.debug(
      `Parsed ${buildings.length} building(s) with ${buildings.reduce(
        (total, building) => total + building.airToAirUnits.length + building.airToWaterUnits.length,
        0,
      )} unit(s)`,
    )
    return buildings
  }
}
