import type { RawUnit } from '../types/api.js'
import type { Unit, UnitKind } from '../types/normalized.js'

/**
 * Base class for the two MELCloud Home device families
 * Each family knows how to parse its wire representation and how to address writes to it
 */
export abstract class BaseUnitModel<TUnit extends Unit, TPayload extends object> {
  /**
   * Device family handled by this model
   */
  abstract readonly kind: UnitKind

  /**
   * Normalize the raw unit from the user context into the domain model
   */
  abstract parse(raw: RawUnit): TUnit

  /**
   * A write body with every control field present and set to null
   */
  abstract emptyPayload(): TPayload

  /**
   * Path of the write endpoint for a unit
   */
  abstract endpoint(unitId: string): string

  /**
   * Build a sparse write body: the changed fields set, everything else null
   */
  public buildPayload(updates: Partial<TPayload>): TPayload {
    return { ...this.emptyPayload(), ...updates }
  }

  /**
   * Display name, falling back to the given default when the unit has none
   */
  protected getUnitName(raw: RawUnit, fallback: string): string {
    return raw.givenDisplayName?.trim() || fallback
  }

  /**
   * Reported capabilities, or an empty record when the unit sends none
   */
  protected getRawCapabilities(raw: RawUnit): Record<string, unknown> {
    return raw.capabilities ?? {}
  }
}
