import { getValveTarget } from './appliances/air-to-water.js'
import { ControlClient } from './client.js'
import { loadConfig } from './config.js'
import { SyncCoordinator } from './coordinator.js'
import { buildDiagnostics } from './diagnostics.js'
import createLogger from './logger.js'
import { TimerScheduler } from './scheduler.js'
import type { Building } from './types/normalized.js'

const logger = createLogger('app')

const summarize = (buildings: readonly Building[]): string =>
  buildings
    .map((building) => {
      const atw = building.airToWaterUnits.map((unit) => `${unit.name}: ${unit.status} (${getValveTarget(unit)})`)
      const ata = building.airToAirUnits.map(
        (unit) => `${unit.name}: ${unit.power ? unit.operationMode : 'Off'} ${unit.roomTemperature ?? '-'}°C`,
      )
      return `${building.name} [${[...atw, ...ata].join(', ') || 'no units'}]`
    })
    .join('; ')

const main = async () => {
  const config = loadConfig()
  logger.info(`Starting MELCloud Home sync, polling every ${config.pollIntervalMs / 1000} seconds`)

  const client = new ControlClient({
    baseUrl: config.baseUrl,
    requestSpacingMs: config.requestSpacingMs,
  })
  const scheduler = new TimerScheduler()
  const coordinator = new SyncCoordinator({
    client,
    scheduler,
    credentials: { email: config.email, password: config.password },
    pollIntervalMs: config.pollIntervalMs,
    debounceMs: config.debounceMs,
    outdoorTemperatureTtlMs: config.outdoorTemperatureTtlMs,
    telemetryTtlMs: config.telemetryTtlMs,
    staleAfterFailures: config.staleAfterFailures,
    showChanges: config.showChanges,
    ignoredKeys: config.ignoredKeys,
  })

  coordinator.onUpdate((buildings) => {
    logger.info(`Updated: ${summarize(buildings)}`)
  })

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) {
      return
    }
    stopping = true
    logger.info(`Received ${signal}, stopping`)
    try {
      await coordinator.stop()
    } finally {
      scheduler.cancelAll()
      process.exit(0)
    }
  }
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => logger.error('Shutdown failed:', error))
    })
  }

  // kill -USR2 <pid> dumps the current state
  process.on('SIGUSR2', () => {
    logger.info('Diagnostics:', JSON.stringify(buildDiagnostics(coordinator), null, 2))
  })

  await coordinator.start()
  if (!coordinator.lastUpdateSucceeded) {
    logger.warn('First poll failed, retrying on the regular interval')
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal:', error instanceof Error ? error.message : error)
  process.exit(1)
})
