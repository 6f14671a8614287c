/**
 * Package for handling configuration in an application
 */

import fs from "fs"
import { type Emitter, EmitterFor } from "./events.js"
import { getErrorMessage } from "./errors.js"
import { DefaultLogger, type LogWriter, type Logger } from "./logging.js"
import { isRecord, type Optional, type TypeGuard } from "./type/utils.js"

export interface ConfigurationEvents {
  /**
   * Event fired when a configuration key is changed
   *
   * @param key The key that changed
   */
  changed(key: string): void

  /**
   * Event fired when a configuration key is removed
   *
   * @param key The key that was removed
   */
  removed(key: string): void

  /**
   * Event fired when a configuration key is added
   *
   * @param key The key that was added
   */
  added(key: string): void
}

/**
 * Manages configuration values
 */
export interface ConfigurationManager extends Emitter<ConfigurationEvents> {
  /**
   * Iterate over the known keys
   */
  getKeys(): IterableIterator<string>

  /**
   * Gets the configuration value associated with the given key if it passes
   * the guard
   *
   * @param configKey The key for the configuration to load
   * @param guard The {@link TypeGuard} the stored item must satisfy
   * @param defaultValue The optional default value to return if the key is
   * not found or the item has the wrong shape
   */
  getConfiguration<T>(
    configKey: string,
    guard: TypeGuard<T>,
    defaultValue?: T,
  ): Optional<T>
}

/**
 * Required shape for configuration items stored in files
 */
export type ConfigurationItem<T extends object> = {
  /** The configuration key  */
  key: string

  /** The item contents associated with this key */
  item: T
}

function isConfigurationItem(
  value: unknown,
): value is ConfigurationItem<object> {
  return (
    isRecord(value) &&
    typeof value.key === "string" &&
    typeof value.item === "object" &&
    value.item !== null
  )
}

/**
 * Options for the {@link MemoryConfigurationManager}
 */
export interface MemoryConfigurationManagerOptions {
  /** The optional log writer to use */
  logWriter?: LogWriter
}

/**
 * {@link ConfigurationManager} that holds its items in memory and fires
 * events as they are set or removed
 */
export class MemoryConfigurationManager
  extends EmitterFor<ConfigurationEvents>
  implements ConfigurationManager
{
  private readonly _logger: Logger
  private readonly _configMap: Map<string, unknown> = new Map()

  constructor(options?: MemoryConfigurationManagerOptions) {
    super()

    this._logger = new DefaultLogger({
      name: "MemoryConfigurationManager",
      writer: options?.logWriter,
    })
  }

  getKeys(): IterableIterator<string> {
    return this._configMap.keys()
  }

  getConfiguration<T>(
    configKey: string,
    guard: TypeGuard<T>,
    defaultValue?: T,
  ): Optional<T> {
    const value = this._configMap.get(configKey)
    if (value === undefined) {
      return defaultValue
    }

    if (!guard(value)) {
      this._logger.warn(`Configuration ${configKey} has an invalid shape`)
      return defaultValue
    }

    return value
  }

  /**
   * Set the item for the key and fire the matching event
   *
   * @param key The configuration key
   * @param item The item to store
   */
  set(key: string, item: unknown): void {
    const event = this._configMap.has(key) ? "changed" : "added"
    this._configMap.set(key, item)

    this._logger.debug(`${key} => ${event}`)
    this.emit(event, key)
  }

  /**
   * Remove the item for the key
   *
   * @param key The configuration key
   * @returns True if the key existed
   */
  remove(key: string): boolean {
    if (this._configMap.delete(key)) {
      this._logger.debug(`Removed ${key}`)
      this.emit("removed", key)
      return true
    }

    return false
  }
}

/**
 * Load the file contents assuming they are formatted as a single
 * {@link ConfigurationItem} or array of them
 *
 * @param contents The file contents
 * @returns An array of {@link ConfigurationItem} parsed from the contents
 */
export function parseConfigurationItems(
  contents: string,
): ConfigurationItem<object>[] {
  const json: unknown = JSON.parse(contents)
  if (Array.isArray(json)) {
    return json.filter(isConfigurationItem)
  } else if (isConfigurationItem(json)) {
    return [json]
  }

  return []
}

/**
 * Reads a JSON file of {@link ConfigurationItem} entries into the manager
 *
 * @param fileName The file to load
 * @param manager The {@link MemoryConfigurationManager} to populate
 * @returns The keys that were loaded, empty if the file was unreadable
 */
export function loadConfigurationFile(
  fileName: string,
  manager: MemoryConfigurationManager,
  logWriter?: LogWriter,
): string[] {
  const logger = new DefaultLogger({
    name: "loadConfigurationFile",
    writer: logWriter,
  })

  let items: ConfigurationItem<object>[]
  try {
    items = parseConfigurationItems(fs.readFileSync(fileName, "utf8"))
  } catch (err) {
    logger.error(
      `Failed to load ${fileName}: ${getErrorMessage(err) ?? "unknown error"}`,
      err,
    )
    return []
  }

  for (const item of items) {
    manager.set(item.key, item.item)
  }

  logger.info(`Loaded ${items.length} item(s) from ${fileName}`)
  return items.map((i) => i.key)
}
