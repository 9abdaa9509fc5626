/**
 * Media Metadata Service
 *
 * Measures audio duration: WAV files from their header and size, every
 * other container through ffprobe.
 */

import { execFile } from 'child_process'
import { promisify } from 'util'
import type { AudioFormatInfo } from './audioFormats'
import { loggerService } from './loggerService'
import { validateWavFile } from './wavUtils'

const execFileAsync = promisify(execFile)
const log = loggerService.scope('MediaMetadata')

const FFPROBE_TIMEOUT_MS = 15000

export type DurationProbe = (filePath: string) => Promise<number>

/**
 * Duration in seconds as reported by ffprobe
 */
export const ffprobeDuration: DurationProbe = async (filePath: string) => {
  const { stdout } = await execFileAsync(
    'ffprobe',
    ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
    { timeout: FFPROBE_TIMEOUT_MS }
  )
  const duration = Number.parseFloat(stdout.trim())
  if (!Number.isFinite(duration)) {
    throw new Error(`ffprobe returned no duration for ${filePath}`)
  }
  return duration
}

export class MediaMetadataService {
  constructor(private readonly probe: DurationProbe = ffprobeDuration) {}

  /**
   * Duration in seconds. Throws when it cannot be determined.
   */
  async getDuration(filePath: string, format: AudioFormatInfo): Promise<number> {
    if (format.container === 'wav') {
      const info = validateWavFile(filePath)
      if (!info.valid) {
        throw new Error(info.error ?? 'Invalid WAV file')
      }
      return info.durationSeconds
    }

    const duration = await this.probe(filePath)
    log.debug('Probed duration', { filePath, duration })
    return duration
  }
}

export const mediaMetadataService = new MediaMetadataService()
