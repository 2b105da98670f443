import { pino, type Level, type Logger as PinoInstance } from 'pino'
import type { Logger, LoggerContext } from '../../application/ports/logger.js'
import { isProduction, type Config } from '../../composition/config.js'

export class PinoLogger implements Logger {
  constructor(private readonly pinoInstance: PinoInstance) {}

  static fromConfig(config: Config): PinoLogger {
    const pretty = config.logging.pretty && !isProduction(config)
    return new PinoLogger(pino({
      name: config.logging.name,
      level: config.logging.level,
      transport: pretty ? {
        target: 'pino-pretty',
        options: {
          colorize: true
        }
      } : undefined
    }))
  }

  info(message: string, obj?: object): void {
    this.log('info', message, obj)
  }

  error(message: string, obj?: object): void {
    this.log('error', message, obj)
  }

  warn(message: string, obj?: object): void {
    this.log('warn', message, obj)
  }

  debug(message: string, obj?: object): void {
    this.log('debug', message, obj)
  }

  child(context: LoggerContext): Logger {
    return new PinoLogger(this.pinoInstance.child(context))
  }

  private log(level: Level, message: string, obj?: object): void {
    if (obj) {
      this.pinoInstance[level](obj, message)
    } else {
      this.pinoInstance[level](message)
    }
  }
}
