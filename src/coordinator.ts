import { Mutex } from 'async-mutex'
import { Cache } from './cache.js'
import type { ControlClient } from './client.js'
import {
  type AtaCommand,
  type AtwCommand,
  assertAtaCommandSupported,
  assertAtwCommandSupported,
  commandTarget,
  type ControlCommand,
  describeCommand,
  isAtaCommandApplied,
  isAtwCommand,
  isAtwCommandApplied,
  sendCommand,
  validateCommand,
} from './commands.js'
import {
  type AtaFanSpeed,
  type AtaOperationMode,
  type AtaVaneHorizontal,
  type AtaVaneVertical,
  ATW_TELEMETRY_MEASURES,
  type AtwZoneMode,
} from './constants.js'
import { AuthenticationError, DeviceNotFoundError } from './errors.js'
import createLogger from './logger.js'
import { type Cancel, type Scheduler, TimerScheduler } from './scheduler.js'
import { type Credentials, Session, type SessionState } from './session.js'
import { formatStateDifferences, getStateDifferences } from './state-differences.js'
import type { AirToAirUnit, AirToWaterUnit, Building, Unit, ZoneNumber } from './types/normalized.js'
import { deepFreeze, shortId } from './utils.js'

const logger = createLogger('coordinator')

const DEFAULT_POLL_INTERVAL_MS = 60_000
const DEFAULT_DEBOUNCE_MS = 2_000
const DEFAULT_OUTDOOR_TEMPERATURE_TTL_MS = 30 * 60 * 1000
const DEFAULT_TELEMETRY_TTL_MS = 5 * 60 * 1000
const DEFAULT_STALE_AFTER_FAILURES = 3

export interface UnitEntry<TUnit extends Unit> {
  unit: TUnit
  building: Building
}

/**
 * Snapshot plus both indexes, always replaced as one reference
 */
export interface SyncState {
  buildings: readonly Building[]
  ataIndex: ReadonlyMap<string, UnitEntry<AirToAirUnit>>
  atwIndex: ReadonlyMap<string, UnitEntry<AirToWaterUnit>>
}

export type UpdateListener = (buildings: readonly Building[]) => void

export interface SyncCoordinatorOptions {
  client: ControlClient
  credentials: Credentials
  scheduler?: Scheduler
  pollIntervalMs?: number
  debounceMs?: number
  outdoorTemperatureTtlMs?: number
  fetchOutdoorTemperature?: boolean
  telemetryTtlMs?: number
  fetchTelemetry?: boolean
  showChanges?: boolean
  ignoredKeys?: readonly string[]
  staleAfterFailures?: number
}

const EMPTY_STATE: SyncState = Object.freeze({
  buildings: Object.freeze([]),
  ataIndex: new Map<string, UnitEntry<AirToAirUnit>>(),
  atwIndex: new Map<string, UnitEntry<AirToWaterUnit>>(),
})

function buildState(buildings: Building[]): SyncState {
  const ataIndex = new Map<string, UnitEntry<AirToAirUnit>>()
  const atwIndex = new Map<string, UnitEntry<AirToWaterUnit>>()

  for (const building of buildings) {
    deepFreeze(building)
    for (const unit of building.airToAirUnits) {
      ataIndex.set(unit.id, { unit, building })
    }
    for (const unit of building.airToWaterUnits) {
      atwIndex.set(unit.id, { unit, building })
    }
  }

  return Object.freeze({ buildings: Object.freeze(buildings), ataIndex, atwIndex })
}

/**
 * Keeps the cached view of every building in sync with the cloud and routes control requests back to it.
 *
 * Reads never touch the network: they go to the last snapshot, which is swapped as a whole after each
 * successful poll. Writes are checked against that snapshot first, then sent with one re-login and one
 * retry when the session has expired, and followed by a debounced refresh instead of a refetch.
 */
export class SyncCoordinator {
  private readonly client: ControlClient
  private readonly credentials: Credentials
  private readonly scheduler: Scheduler
  private readonly pollIntervalMs: number
  private readonly debounceMs: number
  private readonly fetchOutdoorTemperature: boolean
  private readonly fetchTelemetry: boolean
  private readonly showChanges: boolean
  private readonly ignoredKeys: readonly string[]
  private readonly staleAfterFailures: number
  private readonly outdoorTemperatures: Cache<number | null>
  private readonly telemetry: Cache<number | null>
  private readonly inFlightWrites = new Set<Promise<void>>()
  private readonly authMutex = new Mutex()
  private readonly listeners = new Set<UpdateListener>()

  private state: SyncState = EMPTY_STATE
  private session: Session
  private inFlightPoll: Promise<boolean> | null = null
  private cancelPoll: Cancel | null = null
  private cancelRefresh: Cancel | null = null
  private running = false
  private lastSuccess = false
  private lastUpdate: Date | null = null
  private failures = 0

  constructor(options: SyncCoordinatorOptions) {
    this.client = options.client
    this.credentials = options.credentials
    this.scheduler = options.scheduler ?? new TimerScheduler()
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS
    this.fetchOutdoorTemperature = options.fetchOutdoorTemperature ?? true
    this.fetchTelemetry = options.fetchTelemetry ?? true
    this.showChanges = options.showChanges ?? true
    this.ignoredKeys = options.ignoredKeys ?? []
    this.staleAfterFailures = options.staleAfterFailures ?? DEFAULT_STALE_AFTER_FAILURES
    this.outdoorTemperatures = new Cache<number | null>(
      undefined,
      options.outdoorTemperatureTtlMs ?? DEFAULT_OUTDOOR_TEMPERATURE_TTL_MS,
    )
    this.telemetry = new Cache<number | null>(undefined, options.telemetryTtlMs ?? DEFAULT_TELEMETRY_TTL_MS)
    this.session = Session.unauthenticated(options.credentials.email)
  }

  // Lifecycle

  /**
   * Log in, run the first poll and arm the fixed interval.
   * A rejected login rejects here, a failed first poll is only recorded.
   */
  public async start(): Promise<void> {
    if (this.running) {
      return
    }
    this.running = true
    try {
      await this.ensureAuthenticated()
    } catch (error) {
      this.running = false
      throw error
    }
    await this.refresh()
    // stop() may have run while the first poll was in flight
    if (!this.running) {
      return
    }
    this.cancelPoll = this.scheduler.every(this.pollIntervalMs, () => {
      this.refresh().catch((error: unknown) => logger.error('Scheduled poll failed:', error))
    })
    logger.info(`Started, polling every ${this.pollIntervalMs / 1000}s`)
  }

  /**
   * Cancel both timers, wait for an in-flight poll and in-flight writes, then log out.
   * Writes already sent are not aborted, and they no longer arm a refresh.
   */
  public async stop(): Promise<void> {
    this.running = false
    this.cancelPoll?.()
    this.cancelPoll = null
    this.cancelRefresh?.()
    this.cancelRefresh = null

    if (this.inFlightPoll) {
      await this.inFlightPoll
    }
    // Write failures belong to their callers
    await Promise.allSettled(this.inFlightWrites)

    try {
      await this.client.logout(this.session)
    } catch (error) {
      logger.warn('Logout failed:', error instanceof Error ? error.message : error)
    }
    this.session = Session.unauthenticated(this.credentials.email)
    this.outdoorTemperatures.clear()
    this.telemetry.clear()
    logger.info('Stopped')
  }

  // Reads

  public get snapshot(): readonly Building[] {
    return this.state.buildings
  }

  public getUnit(id: string): AirToAirUnit | undefined {
    return this.state.ataIndex.get(id)?.unit
  }

  public getAtwUnit(id: string): AirToWaterUnit | undefined {
    return this.state.atwIndex.get(id)?.unit
  }

  public getBuildingFor(id: string): Building | undefined {
    return (this.state.ataIndex.get(id) ?? this.state.atwIndex.get(id))?.building
  }

  public get lastUpdateSucceeded(): boolean {
    return this.lastSuccess
  }

  public get lastUpdateAt(): Date | null {
    return this.lastUpdate
  }

  public get consecutiveFailures(): number {
    return this.failures
  }

  public get sessionState(): SessionState {
    return this.session.state
  }

  public get email(): string {
    return this.credentials.email
  }

  /**
   * True after the given number of consecutive failed polls
   */
  public isStale(threshold: number = this.staleAfterFailures): boolean {
    return this.failures >= threshold
  }

  public onUpdate(listener: UpdateListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // Polling

  /**
   * Poll once. A call while a poll is in flight waits for that poll instead of starting another.
   * Resolves to whether the poll succeeded, never rejects for poll errors. A no-op once stopped.
   */
  public refresh(): Promise<boolean> {
    if (this.inFlightPoll) {
      return this.inFlightPoll
    }
    if (!this.running) {
      return Promise.resolve(false)
    }
    const poll = this.poll().finally(() => {
      this.inFlightPoll = null
    })
    this.inFlightPoll = poll
    return poll
  }

  private async poll(): Promise<boolean> {
    let buildings: Building[]
    try {
      buildings = await this.executeWithRetry((session) => this.client.fetchAll(session))
      if (this.fetchOutdoorTemperature) {
        await this.enrichOutdoorTemperatures(buildings)
      }
      if (this.fetchTelemetry) {
        await this.enrichTelemetry(buildings)
      }
    } catch (error) {
      this.failures++
      this.lastSuccess = false
      this.lastUpdate = new Date()
      logger.error(
        `Poll failed (${this.failures} in a row):`,
        error instanceof Error ? error.message : error,
      )
      return false
    }

    const previous = this.state
    this.state = buildState(buildings)
    this.failures = 0
    this.lastSuccess = true
    this.lastUpdate = new Date()

    if (this.showChanges) {
      this.logChanges(previous, this.state)
    }
    this.notify()
    return true
  }

  private async enrichOutdoorTemperatures(buildings: Building[]): Promise<void> {
    for (const building of buildings) {
      for (const unit of building.airToAirUnits) {
        unit.outdoorTemperature = await this.cachedReading(
          this.outdoorTemperatures,
          this.outdoorTemperatures.cacheKey(unit.id).outdoorTemperature,
          `[${shortId(unit.id)}] Outdoor temperature`,
          (session) => this.client.getOutdoorTemperature(session, unit.id),
        )
      }
    }
  }

  private async enrichTelemetry(buildings: Building[]): Promise<void> {
    for (const building of buildings) {
      for (const unit of building.airToWaterUnits) {
        for (const measure of ATW_TELEMETRY_MEASURES) {
          unit.telemetry[measure] = await this.cachedReading(
            this.telemetry,
            this.telemetry.cacheKey(unit.id).telemetry(measure),
            `[${shortId(unit.id)}] Telemetry ${measure}`,
            (session) => this.client.getTelemetry(session, unit.id, measure),
          )
        }
      }
    }
  }

  /**
   * A reading served from its TTL cache. Nulls are cached too; failures other than
   * authentication give null and are retried on the next poll.
   */
  private async cachedReading(
    cache: Cache<number | null>,
    key: string,
    label: string,
    fetch: (session: Session) => Promise<number | null>,
  ): Promise<number | null> {
    if (cache.has(key)) {
      return cache.get(key) ?? null
    }

    try {
      const value = await this.executeWithRetry(fetch)
      cache.set(key, value)
      return value
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error
      }
      logger.debug(`${label} unavailable:`, error instanceof Error ? error.message : error)
      return null
    }
  }

  private logChanges(previous: SyncState, next: SyncState): void {
    const initial = previous === EMPTY_STATE
    this.logIndexChanges(previous.ataIndex, next.ataIndex, initial)
    this.logIndexChanges(previous.atwIndex, next.atwIndex, initial)
  }

  private logIndexChanges<TUnit extends Unit>(
    before: ReadonlyMap<string, UnitEntry<TUnit>>,
    after: ReadonlyMap<string, UnitEntry<TUnit>>,
    initial: boolean,
  ): void {
    for (const [id, { unit }] of after) {
      const old = before.get(id)
      if (!old) {
        if (!initial) {
          logger.info(`[${shortId(id)}] Unit "${unit.name}" appeared`)
        }
        continue
      }
      const differences = getStateDifferences(old.unit, unit, this.ignoredKeys)
      if (Object.keys(differences).length > 0) {
        logger.info(`[${shortId(id)}] "${unit.name}" changed:${formatStateDifferences(differences)}`)
      }
    }
    for (const [id, { unit }] of before) {
      if (!after.has(id)) {
        logger.info(`[${shortId(id)}] Unit "${unit.name}" disappeared`)
      }
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.state.buildings)
      } catch (error) {
        logger.error('Update listener failed:', error)
      }
    }
  }

  /**
   * Re-arm the refresh timer; calls inside the window collapse into one poll
   */
  private scheduleRefresh(): void {
    if (!this.running) {
      return
    }
    this.cancelRefresh?.()
    this.cancelRefresh = this.scheduler.after(this.debounceMs, () => {
      this.cancelRefresh = null
      this.refresh().catch((error: unknown) => logger.error('Debounced refresh failed:', error))
    })
  }

  // Control

  /**
   * Apply a control request to the unit it names
   */
  public async control(command: ControlCommand): Promise<void> {
    if (isAtwCommand(command)) {
      await this.controlAtw(command)
    } else {
      await this.controlAta(command)
    }
  }

  private async controlAtw(command: AtwCommand): Promise<void> {
    const unit = this.getAtwUnit(command.unitId)
    if (!unit) {
      throw new DeviceNotFoundError(command.unitId)
    }
    if (isAtwCommandApplied(command, unit)) {
      logger.debug(`[${shortId(unit.id)}] ${describeCommand(command)} already applied, skipping`)
      return
    }
    validateCommand(command)
    assertAtwCommandSupported(command, unit)
    await this.dispatch(command)
  }

  private async controlAta(command: AtaCommand): Promise<void> {
    const unit = this.getUnit(command.unitId)
    if (!unit) {
      throw new DeviceNotFoundError(command.unitId)
    }
    if (isAtaCommandApplied(command, unit)) {
      logger.debug(`[${shortId(unit.id)}] ${describeCommand(command)} already applied, skipping`)
      return
    }
    validateCommand(command)
    assertAtaCommandSupported(command, unit)
    await this.dispatch(command)
  }

  private async dispatch(command: ControlCommand): Promise<void> {
    logger.info(`[${shortId(command.unitId)}] ${commandTarget(command)} ${describeCommand(command)}`)
    const write = this.executeWithRetry((session) => sendCommand(this.client, session, command))
    this.inFlightWrites.add(write)
    try {
      await write
    } finally {
      this.inFlightWrites.delete(write)
    }
    this.scheduleRefresh()
  }

  public setAtwPower(unitId: string, value: boolean): Promise<void> {
    return this.control({ type: 'SetAtwPower', unitId, value })
  }

  public setAtwStandby(unitId: string, value: boolean): Promise<void> {
    return this.control({ type: 'SetAtwStandby', unitId, value })
  }

  public setZoneTemperature(unitId: string, zone: ZoneNumber, value: number): Promise<void> {
    return this.control({ type: 'SetZoneTemperature', unitId, zone, value })
  }

  public setZoneMode(unitId: string, zone: ZoneNumber, value: AtwZoneMode): Promise<void> {
    return this.control({ type: 'SetZoneMode', unitId, zone, value })
  }

  public setDhwTemperature(unitId: string, value: number): Promise<void> {
    return this.control({ type: 'SetDhwTemperature', unitId, value })
  }

  public setForcedHotWater(unitId: string, value: boolean): Promise<void> {
    return this.control({ type: 'SetForcedHotWater', unitId, value })
  }

  public setAtaPower(unitId: string, value: boolean): Promise<void> {
    return this.control({ type: 'SetAtaPower', unitId, value })
  }

  public setAtaStandby(unitId: string, value: boolean): Promise<void> {
    return this.control({ type: 'SetAtaStandby', unitId, value })
  }

  public setAtaTemperature(unitId: string, value: number): Promise<void> {
    return this.control({ type: 'SetAtaTemperature', unitId, value })
  }

  public setAtaMode(unitId: string, value: AtaOperationMode): Promise<void> {
    return this.control({ type: 'SetAtaMode', unitId, value })
  }

  public setAtaFanSpeed(unitId: string, value: AtaFanSpeed): Promise<void> {
    return this.control({ type: 'SetAtaFanSpeed', unitId, value })
  }

  public setAtaVanes(unitId: string, vertical: AtaVaneVertical, horizontal: AtaVaneHorizontal): Promise<void> {
    return this.control({ type: 'SetAtaVanes', unitId, vertical, horizontal })
  }

  // Session

  /**
   * Run an operation under the current session. On an authentication failure, log in again once
   * and retry once; a second failure is fatal.
   */
  private async executeWithRetry<T>(operation: (session: Session) => Promise<T>): Promise<T> {
    const session = await this.ensureAuthenticated()
    try {
      return await operation(session)
    } catch (error) {
      if (!(error instanceof AuthenticationError)) {
        throw error
      }
      logger.warn('Session rejected, logging in again')
      const renewed = await this.reauthenticate(session)
      try {
        return await operation(renewed)
      } catch (retryError) {
        if (retryError instanceof AuthenticationError) {
          throw new AuthenticationError('Request rejected again after logging in', { cause: retryError })
        }
        throw retryError
      }
    }
  }

  private async ensureAuthenticated(): Promise<Session> {
    if (this.session.isAuthenticated) {
      return this.session
    }
    return this.reauthenticate(this.session)
  }

  /**
   * Replace the failed session. Callers queue on the mutex; whoever gets there after a successful
   * login reuses that session instead of logging in again.
   */
  private reauthenticate(failed: Session): Promise<Session> {
    return this.authMutex.runExclusive(async () => {
      if (this.session !== failed && this.session.isAuthenticated) {
        return this.session
      }
      failed.expire()
      try {
        this.session = await this.client.authenticate(this.credentials)
      } catch (error) {
        logger.error('Login failed:', error instanceof Error ? error.message : error)
        if (error instanceof AuthenticationError) {
          throw error
        }
        throw new AuthenticationError('Login failed', { cause: error })
      }
      logger.info('Logged in')
      return this.session
    })
  }
}
