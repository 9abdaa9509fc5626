/**
 * Audio formats accepted for import, keyed by file extension.
 */

import * as path from 'path'

export type AudioContainer = 'mp3' | 'mpeg4Audio' | 'wav' | 'audio'

export interface AudioFormatInfo {
  container: AudioContainer
  mimeType: string
  /** Lowercased extension including the dot */
  extension: string
}

const FORMATS_BY_EXTENSION: Record<string, { container: AudioContainer; mimeType: string }> = {
  '.mp3': { container: 'mp3', mimeType: 'audio/mpeg' },
  '.m4a': { container: 'mpeg4Audio', mimeType: 'audio/mp4' },
  '.mp4': { container: 'mpeg4Audio', mimeType: 'audio/mp4' },
  '.wav': { container: 'wav', mimeType: 'audio/wav' },
  '.wave': { container: 'wav', mimeType: 'audio/wav' },
  // Generic audio fallback
  '.aac': { container: 'audio', mimeType: 'audio/aac' },
  '.aif': { container: 'audio', mimeType: 'audio/aiff' },
  '.aiff': { container: 'audio', mimeType: 'audio/aiff' },
  '.caf': { container: 'audio', mimeType: 'audio/x-caf' },
  '.flac': { container: 'audio', mimeType: 'audio/flac' },
  '.oga': { container: 'audio', mimeType: 'audio/ogg' },
  '.ogg': { container: 'audio', mimeType: 'audio/ogg' },
  '.opus': { container: 'audio', mimeType: 'audio/opus' }
}

export const SUPPORTED_AUDIO_EXTENSIONS: readonly string[] = Object.keys(FORMATS_BY_EXTENSION)

/**
 * Format of a file from its extension, or null when it is not audio we accept
 */
export function detectAudioFormat(filePath: string): AudioFormatInfo | null {
  const extension = path.extname(filePath).toLowerCase()
  const format = FORMATS_BY_EXTENSION[extension]
  return format ? { ...format, extension } : null
}

/**
 * Identifier reported when a file is rejected
 */
export function typeIdentifierFor(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase()
  return extension.length > 1 ? extension.slice(1) : 'unknown'
}

/**
 * Content type used when uploading a stored chunk
 */
export function contentTypeForPath(filePath: string): string {
  return detectAudioFormat(filePath)?.mimeType ?? 'application/octet-stream'
}
