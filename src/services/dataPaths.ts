/**
 * Data directory resolution
 *
 * Everything the library writes (database, logs, recordings) lives under a
 * single data directory: SERMON_CAPTURE_DATA_DIR, or ~/.sermon-capture.
 */

import * as os from 'os'
import * as path from 'path'

const DATA_DIR_ENV = 'SERMON_CAPTURE_DATA_DIR'
const DEFAULT_DATA_DIR_NAME = '.sermon-capture'
const DB_NAME = 'sermons.db'

export function getDataDir(): string {
  const fromEnv = process.env[DATA_DIR_ENV]
  if (fromEnv && fromEnv.trim().length > 0) {
    return path.resolve(fromEnv)
  }
  return path.join(os.homedir(), DEFAULT_DATA_DIR_NAME)
}

export function getDefaultDatabasePath(): string {
  return path.join(getDataDir(), DB_NAME)
}

export function getDefaultRecordingsDir(): string {
  return path.join(getDataDir(), 'recordings')
}
