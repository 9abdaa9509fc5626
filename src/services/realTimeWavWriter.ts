/**
 * Real-Time WAV Writer
 *
 * Writes one capture chunk incrementally as PCM arrives:
 * - a placeholder header is written when the file is opened
 * - audio is appended in arrival order
 * - the header is refreshed periodically so the file stays readable
 * - close() finalizes the header
 */

import * as fs from 'fs'
import * as path from 'path'
import { loggerService } from './loggerService'
import { SerialTaskQueue } from './serialTaskQueue'
import { CAPTURE_FORMAT, WAV_HEADER_SIZE, bytesPerSecond, createWavHeader, type WavFormat } from './wavUtils'

const log = loggerService.scope('RealTimeWavWriter')

// ============================================================================
// Types
// ============================================================================

export interface RealTimeWavWriterConfig {
  filePath: string
  format?: WavFormat
  /** How often to update the WAV header (in bytes written). Default: 32KB */
  headerUpdateInterval?: number
}

export interface RealTimeWavWriterState {
  isOpen: boolean
  /** Audio bytes written, excluding the header */
  bytesWritten: number
  filePath: string
  error?: string
}

/** 32KB = ~1 second at 16kHz mono 16-bit */
const DEFAULT_HEADER_UPDATE_INTERVAL = 32768

// ============================================================================
// RealTimeWavWriter Class
// ============================================================================

export class RealTimeWavWriter {
  private readonly format: WavFormat
  private readonly headerUpdateInterval: number
  private fd: number | null = null
  private state: RealTimeWavWriterState
  private bytesSinceLastHeaderUpdate: number = 0
  private readonly writes = new SerialTaskQueue()

  constructor(config: RealTimeWavWriterConfig) {
    this.format = config.format ?? CAPTURE_FORMAT
    this.headerUpdateInterval = config.headerUpdateInterval ?? DEFAULT_HEADER_UPDATE_INTERVAL
    this.state = {
      isOpen: false,
      bytesWritten: 0,
      filePath: config.filePath
    }
  }

  /**
   * Create the file and write the initial header
   */
  open(): void {
    if (this.state.isOpen) {
      throw new Error('WAV writer is already open')
    }

    try {
      fs.mkdirSync(path.dirname(this.state.filePath), { recursive: true })
      this.fd = fs.openSync(this.state.filePath, 'w')
      fs.writeSync(this.fd, createWavHeader(0, this.format))

      this.state = { isOpen: true, bytesWritten: 0, filePath: this.state.filePath }
      this.bytesSinceLastHeaderUpdate = 0

      log.debug('Opened WAV file', { filePath: this.state.filePath })
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error)
      this.state.error = errorMessage
      throw new Error(`Failed to open WAV file: ${errorMessage}`)
    }
  }

  /**
   * Append raw PCM in the configured format. Writes are applied in call order.
   */
  write(data: Buffer): Promise<void> {
    if (!this.state.isOpen) {
      return Promise.reject(new Error('WAV writer is not open'))
    }
    if (data.length === 0) {
      return Promise.resolve()
    }

    return this.writes.run(() => {
      if (this.fd === null) return

      try {
        fs.writeSync(this.fd, data)
        this.state.bytesWritten += data.length
        this.bytesSinceLastHeaderUpdate += data.length

        if (this.bytesSinceLastHeaderUpdate >= this.headerUpdateInterval) {
          this.updateHeader(this.fd)
          this.bytesSinceLastHeaderUpdate = 0
        }
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error)
        this.state.error = errorMessage

        if (errorMessage.includes('ENOSPC')) {
          throw new Error('Disk space error: No space left on device')
        }
        if (errorMessage.includes('EACCES') || errorMessage.includes('EPERM')) {
          throw new Error('Permission error: Cannot write to file')
        }
        throw error
      }
    })
  }

  private updateHeader(fd: number): void {
    const header = createWavHeader(this.state.bytesWritten, this.format)
    fs.writeSync(fd, header, 0, header.length, 0)
  }

  /**
   * Wait for pending writes, finalize the header and close the file
   */
  async close(): Promise<void> {
    if (!this.state.isOpen || this.fd === null) {
      return
    }

    const fd = this.fd
    try {
      await this.writes.drain()
      this.updateHeader(fd)
      fs.fsyncSync(fd)
    } finally {
      fs.closeSync(fd)
      this.fd = null
      this.state.isOpen = false
    }

    log.debug('Closed WAV file', {
      filePath: this.state.filePath,
      bytesWritten: this.state.bytesWritten
    })
  }

  getState(): RealTimeWavWriterState {
    return { ...this.state }
  }

  getFilePath(): string {
    return this.state.filePath
  }

  isOpen(): boolean {
    return this.state.isOpen
  }

  /**
   * Seconds of audio written so far
   */
  getDuration(): number {
    return this.state.bytesWritten / bytesPerSecond(this.format)
  }

  /**
   * Total file size once closed
   */
  getFileSize(): number {
    return WAV_HEADER_SIZE + this.state.bytesWritten
  }
}
