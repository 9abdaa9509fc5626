/**
 * WAV File Utilities
 *
 * Header creation and parsing for the PCM WAV chunks written during
 * recording, plus the duration and waveform read-outs computed from them.
 */

import * as fs from 'fs'

// ============================================================================
// Types
// ============================================================================

export interface WavFormat {
  sampleRate: number
  channels: number
  bitDepth: number
}

export interface WavFileInfo extends WavFormat {
  /** Whether the file is a valid WAV file */
  valid: boolean
  /** Data size according to the WAV header */
  headerDataSize: number
  /** Actual data size (file size - header size) */
  actualDataSize: number
  /** Duration in seconds based on actual data size */
  durationSeconds: number
  /** Error message if validation failed */
  error?: string
}

// ============================================================================
// Constants
// ============================================================================

/** Standard WAV header size in bytes */
export const WAV_HEADER_SIZE = 44

/** Capture format: 16 kHz mono 16-bit PCM */
export const CAPTURE_FORMAT: Readonly<WavFormat> = {
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16
}

export function bytesPerSecond(format: WavFormat): number {
  return format.sampleRate * format.channels * (format.bitDepth / 8)
}

/**
 * Create a 44-byte PCM WAV header for dataSize bytes of audio
 */
export function createWavHeader(dataSize: number, format: WavFormat = CAPTURE_FORMAT): Buffer {
  const header = Buffer.alloc(WAV_HEADER_SIZE)
  const blockAlign = format.channels * (format.bitDepth / 8)

  // RIFF chunk descriptor
  header.write('RIFF', 0)
  header.writeUInt32LE(36 + dataSize, 4)
  header.write('WAVE', 8)

  // fmt sub-chunk
  header.write('fmt ', 12)
  header.writeUInt32LE(16, 16) // SubChunk1Size (16 for PCM)
  header.writeUInt16LE(1, 20) // AudioFormat (1 = PCM)
  header.writeUInt16LE(format.channels, 22)
  header.writeUInt32LE(format.sampleRate, 24)
  header.writeUInt32LE(bytesPerSecond(format), 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(format.bitDepth, 34)

  // data sub-chunk
  header.write('data', 36)
  header.writeUInt32LE(dataSize, 40)

  return header
}

/**
 * Validate a WAV file and measure it from its actual size, which stays
 * correct even if the header was never finalized.
 */
export function validateWavFile(filePath: string): WavFileInfo {
  const result: WavFileInfo = {
    valid: false,
    headerDataSize: 0,
    actualDataSize: 0,
    sampleRate: 0,
    channels: 0,
    bitDepth: 0,
    durationSeconds: 0
  }

  try {
    if (!fs.existsSync(filePath)) {
      result.error = `File not found: ${filePath}`
      return result
    }

    const fd = fs.openSync(filePath, 'r')
    const headerBuffer = Buffer.alloc(WAV_HEADER_SIZE)
    let stats: fs.Stats
    try {
      fs.readSync(fd, headerBuffer, 0, WAV_HEADER_SIZE, 0)
      stats = fs.fstatSync(fd)
    } finally {
      fs.closeSync(fd)
    }

    if (stats.size < WAV_HEADER_SIZE) {
      result.error = 'File too small to be a valid WAV file'
      return result
    }

    const riff = headerBuffer.toString('ascii', 0, 4)
    const wave = headerBuffer.toString('ascii', 8, 12)

    if (riff !== 'RIFF' || wave !== 'WAVE') {
      result.error = 'Invalid WAV file: Missing RIFF/WAVE header'
      return result
    }

    result.channels = headerBuffer.readUInt16LE(22)
    result.sampleRate = headerBuffer.readUInt32LE(24)
    result.bitDepth = headerBuffer.readUInt16LE(34)
    result.headerDataSize = headerBuffer.readUInt32LE(40)
    result.actualDataSize = stats.size - WAV_HEADER_SIZE

    const rate = bytesPerSecond(result)
    if (rate > 0) {
      result.durationSeconds = result.actualDataSize / rate
    }

    result.valid = true
    return result
  } catch (error) {
    result.error = `Failed to validate WAV file: ${error instanceof Error ? error.message : String(error)}`
    return result
  }
}

/**
 * Duration in seconds, or 0 if the file is invalid
 */
export function getWavDuration(filePath: string): number {
  const info = validateWavFile(filePath)
  return info.valid ? info.durationSeconds : 0
}

/**
 * Summarize 16-bit PCM into `count` RMS buckets normalized so the loudest
 * bucket is 1. Silence yields all zeros.
 */
export function summarizePcm16(pcm: Buffer, count: number): number[] {
  const sampleCount = Math.floor(pcm.length / 2)
  if (count <= 0) return []
  if (sampleCount === 0) return new Array<number>(count).fill(0)

  const buckets: number[] = []
  for (let bucket = 0; bucket < count; bucket++) {
    const start = Math.floor((bucket * sampleCount) / count)
    const end = Math.max(start + 1, Math.floor(((bucket + 1) * sampleCount) / count))
    let sumSquares = 0
    let n = 0
    for (let i = start; i < end && i < sampleCount; i++) {
      const sample = pcm.readInt16LE(i * 2) / 32768
      sumSquares += sample * sample
      n++
    }
    buckets.push(n > 0 ? Math.sqrt(sumSquares / n) : 0)
  }

  const peak = Math.max(...buckets)
  return peak > 0 ? buckets.map(value => value / peak) : buckets
}

/**
 * Waveform samples for a 16-bit PCM WAV file, or null for anything else
 */
export function generateWaveformSamples(filePath: string, count: number): number[] | null {
  const info = validateWavFile(filePath)
  if (!info.valid || info.bitDepth !== 16) {
    return null
  }

  const data = fs.readFileSync(filePath).subarray(WAV_HEADER_SIZE)
  return summarizePcm16(data, count)
}
