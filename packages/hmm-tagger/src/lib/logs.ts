import { pino, type Logger } from 'pino'
import { environment } from './environment.js'

export type { Logger }

export function createLogger(name: string): Logger {
  return pino({ name, level: environment().HMM_LOG_LEVEL })
}
