// Console output is silenced in tests unless LOG_LEVEL asks for it.
// pino writes to stdout directly and follows LOG_LEVEL on its own.

type ConsoleMethod = 'log' | 'info' | 'debug' | 'warn' | 'error'

const visibleAt: Record<string, readonly ConsoleMethod[]> = {
  debug: ['log', 'info', 'debug', 'warn', 'error'],
  info: ['info', 'warn', 'error'],
  warn: ['warn', 'error'],
  error: ['error'],
}

const visible = visibleAt[process.env.LOG_LEVEL?.toLowerCase() ?? ''] ?? []
const silence = () => undefined

for (const method of ['log', 'info', 'debug', 'warn', 'error'] as const) {
  if (!visible.includes(method)) {
    console[method] = silence
  }
}
