import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import type {
  DestinationStream,
  LevelWithSilent,
  Logger,
  LoggerOptions,
} from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import type { LogDestination } from '../types/config.types.js'

export type { Logger } from 'pino'

export const validLogLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const satisfies readonly LevelWithSilent[]

export interface LoggerSettings {
  level?: LevelWithSilent
  destination?: LogDestination
  /** Directory for rotated log files, defaults to <project>/data/logs */
  logDirectory?: string
}

interface ResolvedLoggerConfig {
  options: LoggerOptions
  stream?: DestinationStream
}

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

const PRETTY_OPTIONS = {
  translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
  ignore: 'pid,hostname',
  colorize: true,
}

/**
 * Creates a custom error serializer that keeps the fields of the relay's
 * error classes (kind, status, path, expression) alongside message and stack.
 *
 * @returns A function that properly serializes error objects with message, stack, name, and custom properties.
 */
export function createErrorSerializer() {
  return (
    err: Error | Record<string, unknown> | string | number | boolean,
  ): unknown => {
    if (err == null) {
      return err
    }

    // Handle primitive values (string, number, boolean)
    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Exclude stack traces for 4xx responses to reduce noise
    const status =
      'status' in err && typeof err.status === 'number' ? err.status : undefined
    const shouldIncludeStack = !status || status >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    // Include cause if provided (often non-enumerable on Error)
    if ('cause' in err && err.cause) {
      const cause = err.cause
      serialized.cause =
        cause instanceof Error || typeof cause !== 'object'
          ? createErrorSerializer()(
              cause instanceof Error ? cause : String(cause),
            )
          : cause
    }

    for (const key of Object.keys(err)) {
      if (!['message', 'stack', 'name', 'status', 'type'].includes(key)) {
        serialized[key] = Reflect.get(err, key)
      }
    }

    return serialized
  }
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * If no date or timestamp is provided, returns 'headline-relay-current.log'.
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'headline-relay-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `headline-relay-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream for logging, ensuring the log directory exists.
 *
 * @returns A rotating file stream, or {@link process.stdout} if setup fails.
 */
function getFileStream(
  logDirectory: string,
): rfs.RotatingFileStream | NodeJS.WriteStream {
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

function baseOptions(level: LevelWithSilent): LoggerOptions {
  return {
    level,
    serializers: {
      error: createErrorSerializer(),
      err: createErrorSerializer(),
    },
    // Webhook URLs embed their token
    redact: {
      paths: ['webhookUrl', '*.webhookUrl', 'discord.webhookUrl'],
      censor: '[REDACTED]',
    },
  }
}

/**
 * Generates logger configuration for the requested destination.
 *
 * - terminal: pretty-printed output only
 * - file: rotating log files only
 * - both: pretty terminal output plus rotating files
 */
export function createLoggerConfig(
  settings: LoggerSettings = {},
): ResolvedLoggerConfig {
  const level = settings.level ?? 'info'
  const destination = settings.destination ?? 'terminal'
  const logDirectory =
    settings.logDirectory ?? resolve(projectRoot, 'data', 'logs')

  if (destination === 'terminal') {
    return {
      options: {
        ...baseOptions(level),
        transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
      },
    }
  }

  const fileStream = getFileStream(logDirectory)

  if (destination === 'file') {
    return { options: baseOptions(level), stream: fileStream }
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return {
      options: {
        ...baseOptions(level),
        transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
      },
    }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })

  const streamLevel = level === 'silent' ? 'fatal' : level

  return {
    options: baseOptions(level),
    stream: pino.multistream([
      { stream: prettyStream, level: streamLevel },
      { stream: fileStream, level: streamLevel },
    ]),
  }
}

/**
 * Creates the application logger.
 */
export function createLogger(settings: LoggerSettings = {}): Logger {
  const { options, stream } = createLoggerConfig(settings)
  return stream ? pino(options, stream) : pino(options)
}
