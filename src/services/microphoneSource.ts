/**
 * Microphone Source
 *
 * Opens a raw PCM stream from the system microphone through a command-line
 * recorder (sox, rec or arecord) driven by node-record-lpcm16.
 */

import { exec } from 'child_process'
import type { Readable } from 'stream'
import { promisify } from 'util'
import record from 'node-record-lpcm16'
import { loggerService } from './loggerService'
import type { WavFormat } from './wavUtils'
import type { PermissionProvider } from '../types/collaborators'

const execAsync = promisify(exec)
const log = loggerService.scope('MicrophoneSource')

export type RecorderProgram = 'sox' | 'rec' | 'arecord'

export interface RecorderAvailability {
  recorder: RecorderProgram | null
  error?: string
  instructions?: string
}

/**
 * A live microphone capture: raw little-endian PCM in the requested format
 */
export interface MicrophoneStream {
  stream: Readable
  stop(): void
}

export interface MicrophoneSource {
  open(format: WavFormat): Promise<MicrophoneStream>
}

/**
 * Check if a command exists on the system
 */
export async function commandExists(command: string): Promise<boolean> {
  try {
    const checkCmd = process.platform === 'win32' ? `where ${command}` : `which ${command}`
    await execAsync(checkCmd, { timeout: 5000 })
    return true
  } catch {
    return false
  }
}

/**
 * Get the best available recorder for the current platform
 */
export async function getAvailableRecorder(): Promise<RecorderAvailability> {
  const platform = process.platform

  if (platform === 'darwin' || platform === 'win32') {
    if (await commandExists('sox')) {
      return { recorder: 'sox' }
    }
    if (await commandExists('rec')) {
      return { recorder: 'rec' }
    }
    return {
      recorder: null,
      error: 'sox is not installed',
      instructions: platform === 'darwin'
        ? 'To install sox on macOS, run: brew install sox'
        : 'Install SoX for Windows and add it to PATH.'
    }
  }

  if (platform === 'linux') {
    if (await commandExists('arecord')) {
      return { recorder: 'arecord' }
    }
    if (await commandExists('sox')) {
      return { recorder: 'sox' }
    }
    return {
      recorder: null,
      error: 'arecord is not installed',
      instructions: 'To install arecord on Linux, run: sudo apt-get install alsa-utils'
    }
  }

  return {
    recorder: null,
    error: 'Unsupported platform',
    instructions: `Platform ${platform} is not supported for audio recording.`
  }
}

/**
 * Microphone access on a desktop host amounts to having a recorder program
 */
export const systemMicrophonePermission: PermissionProvider = {
  async requestMicrophonePermission(): Promise<boolean> {
    const { recorder, error } = await getAvailableRecorder()
    if (!recorder) {
      log.warn('No audio recorder available', { error })
    }
    return recorder !== null
  }
}

export interface SystemMicrophoneOptions {
  /** Recorder device name; the system default when omitted */
  device?: string
}

export function createSystemMicrophone(options: SystemMicrophoneOptions = {}): MicrophoneSource {
  return {
    async open(format: WavFormat): Promise<MicrophoneStream> {
      const { recorder, error, instructions } = await getAvailableRecorder()
      if (!recorder) {
        throw new Error(`${error ?? 'No audio recorder available'}. ${instructions ?? ''}`.trim())
      }

      const recording = record.record({
        sampleRate: format.sampleRate,
        channels: format.channels,
        audioType: 'raw',
        recorder,
        silence: '0',
        threshold: 0,
        endOnSilence: false,
        device: options.device ?? null
      })

      log.info('Microphone opened', { recorder, sampleRate: format.sampleRate })

      return {
        stream: recording.stream(),
        stop: () => recording.stop()
      }
    }
  }
}
