import { z } from 'zod'
import { type AirToAirModel, airToAirModel } from './appliances/air-to-air.js'
import { type AirToWaterModel, airToWaterModel } from './appliances/air-to-water.js'
import { BuildingFactory } from './appliances/factory.js'
import {
  assertOneOf,
  validateAtaTemperature,
  validateTankTemperature,
  validateZone,
  validateZoneTemperature,
} from './appliances/validation.js'
import { LoginFlow } from './auth.js'
import {
  ATA_FAN_SPEEDS,
  ATA_OPERATION_MODES,
  ATA_VANE_HORIZONTAL,
  ATA_VANE_VERTICAL,
  ATA_VANE_VERTICAL_TO_NUMBER,
  type AtwTelemetryMeasure,
  ATW_ZONE_MODES,
  BASE_URL,
} from './constants.js'
import { ApiError, AuthenticationError, RateLimitError } from './errors.js'
import { formatAxiosError, HttpClient, type HttpMethod, type HttpResponse, type HttpTransport } from './http.js'
import createLogger from './logger.js'
import { type Credentials, Session } from './session.js'
import {
  type AtaUpdatePayload,
  type AtwUpdatePayload,
  TelemetryActualSchema,
  TrendSummarySchema,
  UserContextSchema,
} from './types/api.js'
import type { Building, ZoneNumber } from './types/normalized.js'
import { formatApiDate, formatTelemetryDate, shortId } from './utils.js'

const logger = createLogger('client')

const USER_CONTEXT_PATH = '/api/user/context'
const TREND_SUMMARY_PATH = '/api/report/trendsummary'
const OUTDOOR_TEMPERATURE_LABEL = 'OUTDOOR_TEMPERATURE'
const TREND_WINDOW_MS = 60 * 60 * 1000 // Outdoor temperature is taken from the last hour of the trend report
const TELEMETRY_PATH = '/api/telemetry/actual'
const TELEMETRY_WINDOW_MS = 4 * 60 * 60 * 1000 // Telemetry is sparse, a shorter window is often empty

const ErrorBodySchema = z.object({ message: z.string() }).passthrough()

export interface ControlClientOptions {
  baseUrl?: string
  requestSpacingMs?: number
  timeoutMs?: number
  // Wait after login before the session is used
  settleMs?: number
  transport?: HttpTransport
}

interface ApiRequestOptions {
  params?: Record<string, string>
  payload?: object
}

/**
 * Client for the MELCloud Home web API.
 * Stateless apart from the cookie jar: every call takes the session it runs under, nothing is cached.
 */
export class ControlClient {
  private readonly http: HttpTransport
  private readonly loginFlow: LoginFlow
  private readonly baseUrl: string
  private readonly ata: AirToAirModel = airToAirModel
  private readonly atw: AirToWaterModel = airToWaterModel

  constructor(options: ControlClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? BASE_URL
    this.http =
      options.transport ??
      new HttpClient({
        baseUrl: this.baseUrl,
        requestSpacingMs: options.requestSpacingMs,
        timeoutMs: options.timeoutMs,
      })
    this.loginFlow = new LoginFlow(this.http, { baseUrl: this.baseUrl, settleMs: options.settleMs })
  }

  /**
   * Run the hosted login and return a fresh authenticated session
   */
  public async authenticate(credentials: Credentials): Promise<Session> {
    if (!credentials.email || !credentials.password) {
      throw new AuthenticationError('Email and password are required')
    }
    await this.loginFlow.login(credentials)
    return new Session(credentials.email, 'authenticated')
  }

  /**
   * Best-effort logout, the session is closed either way
   */
  public async logout(session: Session): Promise<void> {
    if (session.isAuthenticated) {
      await this.loginFlow.logout()
    }
    session.close()
  }

  /**
   * Fetch every building and unit visible to the account in one request
   */
  public async fetchAll(session: Session): Promise<Building[]> {
    const text = await this.apiRequest(session, 'GET', USER_CONTEXT_PATH)

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error) {
      throw new ApiError('User context response is not valid JSON', undefined, { cause: error })
    }

    const parsed = UserContextSchema.safeParse(body)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected shape'
      throw new ApiError(`Malformed user context (${detail})`, undefined, { cause: parsed.error })
    }

    return BuildingFactory.fromUserContext(parsed.data)
  }

  /**
   * Latest outdoor temperature from the trend report of the last hour, null when the unit reports none
   */
  public async getOutdoorTemperature(session: Session, unitId: string): Promise<number | null> {
    const to = new Date()
    const from = new Date(to.getTime() - TREND_WINDOW_MS)
    const text = await this.apiRequest(session, 'GET', TREND_SUMMARY_PATH, {
      params: { unitId, from: formatApiDate(from), to: formatApiDate(to) },
    })

    if (!text) {
      return null
    }

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error) {
      throw new ApiError('Trend summary response is not valid JSON', undefined, { cause: error })
    }

    const parsed = TrendSummarySchema.safeParse(body)
    if (!parsed.success) {
      throw new ApiError('Malformed trend summary', undefined, { cause: parsed.error })
    }

    const dataset = parsed.data.datasets.find(({ label }) => label.includes(OUTDOOR_TEMPERATURE_LABEL))
    const latest = dataset?.data.at(-1)?.y
    logger.debug(`[${shortId(unitId)}] Outdoor temperature points: ${dataset?.data.length ?? 0}, latest: ${latest}`)
    return latest ?? null
  }

  /**
   * Latest value of one air-to-water telemetry measure over the last four hours, null when there is none
   */
  public async getTelemetry(session: Session, unitId: string, measure: AtwTelemetryMeasure): Promise<number | null> {
    const to = new Date()
    const from = new Date(to.getTime() - TELEMETRY_WINDOW_MS)
    const text = await this.apiRequest(session, 'GET', `${TELEMETRY_PATH}/${unitId}`, {
      params: { from: formatTelemetryDate(from), to: formatTelemetryDate(to), measure },
    })

    if (!text) {
      return null
    }

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error) {
      throw new ApiError('Telemetry response is not valid JSON', undefined, { cause: error })
    }

    const parsed = TelemetryActualSchema.safeParse(body)
    if (!parsed.success) {
      throw new ApiError('Malformed telemetry response', undefined, { cause: parsed.error })
    }

    const values = parsed.data.measureData[0]?.values ?? []
    const latest = values.at(-1)?.value
    const value = latest === undefined || latest === null ? null : Number(latest)
    logger.debug(`[${shortId(unitId)}] Telemetry ${measure} points: ${values.length}, latest: ${value}`)
    return value !== null && Number.isFinite(value) ? value : null
  }

  // Air-to-water writes

  public async setAtwPower(session: Session, unitId: string, power: boolean): Promise<void> {
    await this.updateAtw(session, unitId, { power })
  }

  public async setAtwStandby(session: Session, unitId: string, standby: boolean): Promise<void> {
    await this.updateAtw(session, unitId, { inStandbyMode: standby })
  }

  public async setZoneTemperature(session: Session, unitId: string, zone: ZoneNumber, temperature: number): Promise<void> {
    validateZone(zone)
    validateZoneTemperature(temperature, zone)
    await this.updateAtw(
      session,
      unitId,
      zone === 1 ? { setTemperatureZone1: temperature } : { setTemperatureZone2: temperature },
    )
  }

  public async setZoneMode(session: Session, unitId: string, zone: ZoneNumber, mode: string): Promise<void> {
    validateZone(zone)
    assertOneOf(ATW_ZONE_MODES, mode, `zone ${zone} mode`)
    await this.updateAtw(session, unitId, zone === 1 ? { operationModeZone1: mode } : { operationModeZone2: mode })
  }

  public async setDhwTemperature(session: Session, unitId: string, temperature: number): Promise<void> {
    validateTankTemperature(temperature)
    await this.updateAtw(session, unitId, { setTankWaterTemperature: temperature })
  }

  public async setForcedHotWater(session: Session, unitId: string, enabled: boolean): Promise<void> {
    await this.updateAtw(session, unitId, { forcedHotWaterMode: enabled })
  }

  // Air-to-air writes

  public async setAtaPower(session: Session, unitId: string, power: boolean): Promise<void> {
    await this.updateAta(session, unitId, { power })
  }

  public async setAtaStandby(session: Session, unitId: string, standby: boolean): Promise<void> {
    await this.updateAta(session, unitId, { inStandbyMode: standby })
  }

  public async setAtaTemperature(session: Session, unitId: string, temperature: number): Promise<void> {
    validateAtaTemperature(temperature)
    await this.updateAta(session, unitId, { setTemperature: temperature })
  }

  public async setAtaMode(session: Session, unitId: string, mode: string): Promise<void> {
    assertOneOf(ATA_OPERATION_MODES, mode, 'operation mode')
    await this.updateAta(session, unitId, { operationMode: mode })
  }

  public async setAtaFanSpeed(session: Session, unitId: string, speed: string): Promise<void> {
    assertOneOf(ATA_FAN_SPEEDS, speed, 'fan speed')
    await this.updateAta(session, unitId, { setFanSpeed: speed })
  }

  /**
   * Vertical position goes out in its numeric form, horizontal by name
   */
  public async setAtaVanes(session: Session, unitId: string, vertical: string, horizontal: string): Promise<void> {
    assertOneOf(ATA_VANE_VERTICAL, vertical, 'vertical vane direction')
    assertOneOf(ATA_VANE_HORIZONTAL, horizontal, 'horizontal vane direction')
    await this.updateAta(session, unitId, {
      vaneVerticalDirection: ATA_VANE_VERTICAL_TO_NUMBER[vertical],
      vaneHorizontalDirection: horizontal,
    })
  }

  private async updateAtw(session: Session, unitId: string, updates: Partial<AtwUpdatePayload>): Promise<void> {
    const payload = this.atw.buildPayload(updates)
    logger.debug(`[${shortId(unitId)}] Sending air-to-water update:`, updates)
    await this.apiRequest(session, 'PUT', this.atw.endpoint(unitId), { payload })
  }

  private async updateAta(session: Session, unitId: string, updates: Partial<AtaUpdatePayload>): Promise<void> {
    const payload = this.ata.buildPayload(updates)
    logger.debug(`[${shortId(unitId)}] Sending air-to-air update:`, updates)
    await this.apiRequest(session, 'PUT', this.ata.endpoint(unitId), { payload })
  }

  /**
   * Send one request under the session and map the status to the error hierarchy.
   * A 401 expires the session.
   */
  private async apiRequest(
    session: Session,
    method: HttpMethod,
    path: string,
    options: ApiRequestOptions = {},
  ): Promise<string> {
    if (!session.isAuthenticated) {
      throw new AuthenticationError(`Session is ${session.state}, authenticate first`)
    }

    let response: HttpResponse
    try {
      response = await this.http.request({
        method,
        url: `${this.baseUrl}${path}`,
        params: options.params,
        headers: {
          Accept: 'application/json',
          'x-csrf': '1',
          Referer: `${this.baseUrl}/dashboard`,
          ...(options.payload ? { 'Content-Type': 'application/json' } : {}),
        },
        body: options.payload ? JSON.stringify(options.payload) : undefined,
      })
    } catch (error) {
      throw new ApiError(`Request failed: ${formatAxiosError(error)}`, undefined, { cause: error })
    }

    logger.debug(`${method} ${path} [${response.status}]`)

    if (response.status === 401) {
      session.expire()
      throw new AuthenticationError('Session expired or rejected (HTTP 401)')
    }

    if (response.status === 429) {
      throw new RateLimitError()
    }

    // 304 only comes from report endpoints, there is nothing new to read
    if (response.status === 304) {
      return ''
    }

    if (response.status < 200 || response.status >= 300) {
      const message = errorMessage(response.text, response.status)
      throw new ApiError(`API request failed: ${message} [${method} ${path}]`, response.status)
    }

    return response.text
  }
}

function errorMessage(text: string, status: number): string {
  let body: unknown
  try {
    body = JSON.parse(text)
  } catch {
    return `HTTP ${status}`
  }
  const parsed = ErrorBodySchema.safeParse(body)
  return parsed.success ? parsed.data.message : `HTTP ${status}`
}
