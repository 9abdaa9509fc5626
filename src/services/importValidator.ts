/**
 * Import Validator
 *
 * Checks an external audio file (size, format, measurable duration) and
 * copies it into the sermon directory as its single chunk. Validation has
 * no side effects; nothing is created until every check passed.
 */

import * as fs from 'fs'
import * as path from 'path'
import { createAudioChunkDraft } from './audioChunkService'
import { chunkFileName } from './audioCaptureService'
import { detectAudioFormat, typeIdentifierFor, type AudioFormatInfo } from './audioFormats'
import { loggerService } from './loggerService'
import { mediaMetadataService, type MediaMetadataService } from './mediaMetadataService'
import { SermonErrors } from './sermonErrors'
import type { SourceAccess } from '../types/collaborators'
import type { AudioChunk } from '../types/sermon'

const log = loggerService.scope('ImportValidator')

export const DEFAULT_MAX_IMPORT_SIZE_MB = 500
const BYTES_PER_MB = 1024 * 1024

export interface ImportValidatorOptions {
  recordingsDir: string
  maxSizeMB?: number
  metadata?: MediaMetadataService
  sourceAccess?: SourceAccess
}

export interface ValidatedAudio {
  sourcePath: string
  fileSize: number
  format: AudioFormatInfo
  durationSeconds: number
  /** Base name without extension, used as the default title */
  baseName: string
}

export interface ImportedAudio extends ValidatedAudio {
  chunk: AudioChunk
  chunkPath: string
}

export class ImportValidator {
  private readonly maxSizeMB: number
  private readonly metadata: MediaMetadataService

  constructor(private readonly options: ImportValidatorOptions) {
    this.maxSizeMB = options.maxSizeMB ?? DEFAULT_MAX_IMPORT_SIZE_MB
    this.metadata = options.metadata ?? mediaMetadataService
  }

  get maxBytes(): number {
    return this.maxSizeMB * BYTES_PER_MB
  }

  async validate(sourcePath: string): Promise<ValidatedAudio> {
    let stats: fs.Stats
    try {
      stats = await fs.promises.stat(sourcePath)
    } catch (error) {
      throw SermonErrors.importFailed(error instanceof Error ? error.message : String(error))
    }
    if (!stats.isFile()) {
      throw SermonErrors.importFailed(`Not a file: ${sourcePath}`)
    }

    if (stats.size > this.maxBytes) {
      throw SermonErrors.fileTooLarge(this.maxSizeMB)
    }

    const format = detectAudioFormat(sourcePath)
    if (!format) {
      throw SermonErrors.unsupportedAudioFormat(typeIdentifierFor(sourcePath))
    }

    let durationSeconds: number
    try {
      durationSeconds = await this.metadata.getDuration(sourcePath, format)
    } catch (error) {
      throw SermonErrors.importFailed(
        `Could not read audio duration: ${error instanceof Error ? error.message : String(error)}`
      )
    }
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      throw SermonErrors.importFailed('Audio file has no playable duration')
    }

    return {
      sourcePath,
      fileSize: stats.size,
      format,
      durationSeconds,
      baseName: path.basename(sourcePath, path.extname(sourcePath))
    }
  }

  /**
   * Validate, then copy the file to <recordingsDir>/<sermonId>/chunk_000<ext>
   */
  async importFile(sourcePath: string, sermonId: string): Promise<ImportedAudio> {
    const validated = await this.validate(sourcePath)

    const directory = path.join(this.options.recordingsDir, sermonId)
    const chunkPath = path.join(directory, chunkFileName(0, validated.format.extension))

    await this.copyWithAccess(sourcePath, directory, chunkPath)

    const copiedSize = (await fs.promises.stat(chunkPath)).size
    const chunk = createAudioChunkDraft({
      sermon_id: sermonId,
      chunk_index: 0,
      start_offset_seconds: 0,
      duration_seconds: validated.durationSeconds,
      local_path: chunkPath,
      file_size: copiedSize
    })

    log.info('Audio imported', {
      sermonId,
      mimeType: validated.format.mimeType,
      durationSeconds: validated.durationSeconds,
      fileSize: copiedSize
    })

    return { ...validated, chunk, chunkPath }
  }

  private async copyWithAccess(sourcePath: string, directory: string, destination: string): Promise<void> {
    const access = this.options.sourceAccess
    const acquired = access ? await access.acquire(sourcePath) : false

    try {
      await fs.promises.mkdir(directory, { recursive: true })
      await fs.promises.copyFile(sourcePath, destination)
    } catch (error) {
      await fs.promises.rm(directory, { recursive: true, force: true })
      throw SermonErrors.importFailed(
        `Could not copy audio file: ${error instanceof Error ? error.message : String(error)}`
      )
    } finally {
      if (access && acquired) {
        access.release(sourcePath)
      }
    }
  }
}
