/**
 * Logging interfaces
 */

import { HiResClock, type Timestamp } from "./time.js"
import type { Optional } from "./type/utils.js"

/**
 * Levels for logging information
 */
export enum LogLevel {
  FATAL = 0,
  ERROR = 10,
  WARN = 20,
  INFO = 30,
  DEBUG = 40,
}

let DEFAULT_LOG_LEVEL: LogLevel = LogLevel.INFO

export function setDefaultLogLevel(level: LogLevel): void {
  DEFAULT_LOG_LEVEL = level
}

/**
 * Levels to strings
 */
const ReadableLogLevels = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.FATAL]: "FATAL",
} as const

/**
 * Parse a {@link LogLevel} from its readable name (case insensitive)
 *
 * @param value The value to parse
 * @returns The matching {@link LogLevel} or undefined
 */
export function parseLogLevel(value: unknown): Optional<LogLevel> {
  if (typeof value !== "string") {
    return
  }

  const name = value.trim().toUpperCase()
  for (const level of [
    LogLevel.FATAL,
    LogLevel.ERROR,
    LogLevel.WARN,
    LogLevel.INFO,
    LogLevel.DEBUG,
  ]) {
    if (ReadableLogLevels[level] === name) {
      return level
    }
  }

  return
}

/**
 * Defines some simple structure for log information
 */
export interface LogData {
  level: LogLevel
  message: string
  timestamp?: Timestamp
  source?: string
  context?: unknown
}

/**
 * Formatter for {@link LogData} entries
 */
export type LogFormatter = (data: LogData) => string

/**
 * Simple format for {@link LogData} objects
 *
 * @param data The {@link LogData} to format
 * @returns A string with the time, source, level and message
 */
export const SimpleLogFormatter: LogFormatter = (data: LogData) =>
  `${data.timestamp ? `[${data.timestamp.toISOString()}]:` : ""}${data.source ? `(${data.source}) ` : ""}${ReadableLogLevels[data.level]} - ${data.message}`

/**
 * Simple interface for writing {@link LogData} to some source
 */
export interface LogWriter {
  /**
   * Writes the {@link LogData} to the underlying source
   *
   * @param data The {@link LogData} to write
   */
  log(data: LogData): void
}

/**
 * {@link LogWriter} that does nothing
 */
export const NoopLogWriter: LogWriter = {
  log(_data: LogData): void {},
}

/**
 * Simple {@link LogWriter} that outputs to the console
 */
export class ConsoleLogWriter implements LogWriter {
  private _formatter: LogFormatter

  constructor(formatter?: LogFormatter) {
    this._formatter = formatter ?? SimpleLogFormatter
  }

  log(data: LogData): void {
    // eslint-disable-next-line no-console
    console.log(this._formatter(data))
  }
}

/**
 * {@link LogWriter} that keeps every entry in memory, mostly for tests and
 * for hosts that want to inspect what happened during an evaluation
 */
export class MemoryLogWriter implements LogWriter {
  readonly entries: LogData[] = []

  log(data: LogData): void {
    this.entries.push(data)
  }

  /**
   * @param level The {@link LogLevel} to filter by
   * @returns The messages written at exactly that level
   */
  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message)
  }

  clear(): void {
    this.entries.length = 0
  }
}

let DEFAULT_WRITER: LogWriter = NoopLogWriter

/**
 * Sets the default log writer for loggers created without one
 *
 * @param writer The {@link LogWriter} to use for new log creation
 */
export function setDefaultWriter(writer: LogWriter): void {
  DEFAULT_WRITER = writer
}

/**
 * Simple interface for logging information
 */
export interface Logger {
  /** The current {@link LogLevel} */
  readonly level: LogLevel

  /** The source for events logged here */
  readonly name?: string

  /**
   * Update the {@link LogLevel} minimum to write with
   * @param level The new {@link LogLevel} to use
   */
  setLevel(level: LogLevel): void

  debug(message: string, context?: unknown): void
  info(message: string, context?: unknown): void
  warn(message: string, context?: unknown): void
  error(message: string, context?: unknown): void
  fatal(message: string, context?: unknown): void
}

/**
 * Options for configuring loggers
 */
export interface LoggerOptions {
  /** Optional {@link LogLevel} for initial logging, default is the process default */
  level?: LogLevel
  /** Optional source for the logs */
  name?: string
  /** Optional {@link LogWriter}, default is the process default */
  writer?: LogWriter
}

type MessageLogger = (message: string, context?: unknown) => void
const NO_OP_LOGGER: MessageLogger = (
  _message: string,
  _context?: unknown,
): void => {}

/**
 * Simple logger that swaps level methods between no-ops and writers so
 * disabled levels cost a single call
 */
export class DefaultLogger implements Logger {
  private _level: LogLevel
  private _writer: LogWriter
  readonly name?: string

  debug: MessageLogger = NO_OP_LOGGER
  info: MessageLogger = NO_OP_LOGGER
  warn: MessageLogger = NO_OP_LOGGER
  error: MessageLogger = NO_OP_LOGGER
  fatal: MessageLogger

  constructor(options?: LoggerOptions) {
    this._level = options?.level ?? DEFAULT_LOG_LEVEL
    this._writer = options?.writer ?? DEFAULT_WRITER
    this.name = options?.name

    // Fatal is always written
    this.fatal = this._writerFor(LogLevel.FATAL)

    this.setLevel(this._level)
  }

  get level(): LogLevel {
    return this._level
  }

  setLevel(level: LogLevel): void {
    this._level = level

    this.debug =
      level >= LogLevel.DEBUG ? this._writerFor(LogLevel.DEBUG) : NO_OP_LOGGER
    this.info =
      level >= LogLevel.INFO ? this._writerFor(LogLevel.INFO) : NO_OP_LOGGER
    this.warn =
      level >= LogLevel.WARN ? this._writerFor(LogLevel.WARN) : NO_OP_LOGGER
    this.error =
      level >= LogLevel.ERROR ? this._writerFor(LogLevel.ERROR) : NO_OP_LOGGER
  }

  private _writerFor(level: LogLevel): MessageLogger {
    return (message: string, context?: unknown): void => {
      this._writer.log({
        source: this.name,
        timestamp: HiResClock.timestamp(),
        message,
        level,
        context,
      })
    }
  }
}
