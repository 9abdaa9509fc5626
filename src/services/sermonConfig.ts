/**
 * Sermon capture configuration
 *
 * Defaults for every tunable of the capture/processing flow, overlaid with
 * values stored in the settings table under `sermon.*`.
 */

import * as dotenv from 'dotenv'
import * as fs from 'fs'
import * as path from 'path'
import { getDefaultRecordingsDir } from './dataPaths'
import { getDatabaseService } from './database'
import { loggerService } from './loggerService'
import { settingsService } from './settingsService'

const log = loggerService.scope('SermonConfig')

export interface SermonCaptureConfig {
  /** Root directory holding one sub-directory of chunks per sermon */
  recordingsDir: string
  chunkDurationSeconds: number
  minimumRecordingSeconds: number
  maxImportSizeMB: number
  processingTimeoutMs: number
  /** Interval of the elapsed-time counter while recording */
  durationTickMs: number
  levelHistorySize: number
  waveformSampleCount: number
}

export const DEFAULT_SERMON_CONFIG: Readonly<SermonCaptureConfig> = {
  recordingsDir: getDefaultRecordingsDir(),
  chunkDurationSeconds: 600,
  minimumRecordingSeconds: 30,
  maxImportSizeMB: 500,
  processingTimeoutMs: 30 * 60 * 1000,
  durationTickMs: 1000,
  levelHistorySize: 100,
  waveformSampleCount: 100
}

export const SERMON_SETTING_KEYS = {
  chunkDurationSeconds: 'sermon.chunkDurationSeconds',
  minimumRecordingSeconds: 'sermon.minimumRecordingSeconds',
  maxImportSizeMB: 'sermon.maxImportSizeMB',
  processingTimeoutMs: 'sermon.processingTimeoutMs',
  levelHistorySize: 'sermon.levelHistorySize',
  waveformSampleCount: 'sermon.waveformSampleCount',
  recordingsPath: 'storage.recordingsPath'
} as const

type NumericConfigKey = Exclude<keyof SermonCaptureConfig, 'recordingsDir'>

const NUMERIC_KEYS: NumericConfigKey[] = [
  'chunkDurationSeconds',
  'minimumRecordingSeconds',
  'maxImportSizeMB',
  'processingTimeoutMs',
  'durationTickMs',
  'levelHistorySize',
  'waveformSampleCount'
]

/**
 * Throws when a numeric value is not a positive finite number
 */
export function validateSermonConfig(config: SermonCaptureConfig): SermonCaptureConfig {
  for (const key of NUMERIC_KEYS) {
    const value = config[key]
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid sermon config: ${key} must be a positive number (got ${value})`)
    }
  }
  if (config.recordingsDir.trim().length === 0) {
    throw new Error('Invalid sermon config: recordingsDir must not be empty')
  }
  return config
}

/**
 * Build the effective configuration. Stored settings override defaults and
 * explicit overrides win over both. Settings are skipped when the database
 * has not been initialized.
 */
export function loadSermonConfig(overrides: Partial<SermonCaptureConfig> = {}): SermonCaptureConfig {
  const config: SermonCaptureConfig = { ...DEFAULT_SERMON_CONFIG }

  if (getDatabaseService().isInitialized()) {
    config.chunkDurationSeconds = settingsService.getNumber(
      SERMON_SETTING_KEYS.chunkDurationSeconds,
      config.chunkDurationSeconds
    )
    config.minimumRecordingSeconds = settingsService.getNumber(
      SERMON_SETTING_KEYS.minimumRecordingSeconds,
      config.minimumRecordingSeconds
    )
    config.maxImportSizeMB = settingsService.getNumber(
      SERMON_SETTING_KEYS.maxImportSizeMB,
      config.maxImportSizeMB
    )
    config.processingTimeoutMs = settingsService.getNumber(
      SERMON_SETTING_KEYS.processingTimeoutMs,
      config.processingTimeoutMs
    )
    config.levelHistorySize = settingsService.getNumber(
      SERMON_SETTING_KEYS.levelHistorySize,
      config.levelHistorySize
    )
    config.waveformSampleCount = settingsService.getNumber(
      SERMON_SETTING_KEYS.waveformSampleCount,
      config.waveformSampleCount
    )
    config.recordingsDir = settingsService.getString(
      SERMON_SETTING_KEYS.recordingsPath,
      config.recordingsDir
    )
  } else {
    log.debug('Database not initialized, using default sermon config')
  }

  return validateSermonConfig({ ...config, ...overrides })
}

/**
 * Load variables from the given .env file, or from `.env` in the working
 * directory. Variables already present in the environment are kept.
 * Returns the loaded path, or null when there was nothing to load.
 */
export function loadEnvFile(envPath?: string): string | null {
  const candidate = envPath ?? path.join(process.cwd(), '.env')
  if (!fs.existsSync(candidate)) {
    if (envPath) log.warn('Env file not found', { path: envPath })
    return null
  }

  const result = dotenv.config({ path: candidate })
  if (result.error) {
    log.warn('Could not load env file', { path: candidate, error: result.error.message })
    return null
  }

  log.info('Loaded env file', { path: candidate })
  return candidate
}
