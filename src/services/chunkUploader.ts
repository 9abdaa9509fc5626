/**
 * Chunk Uploader
 *
 * Uploads a sermon's chunk files one at a time in index order, reporting
 * (index + 1) / total after each. No automatic retry.
 */

import * as fs from 'fs'
import { loggerService } from './loggerService'
import { SermonErrors, toSermonError } from './sermonErrors'
import type { SermonSync } from '../types/collaborators'
import type { AudioChunk } from '../types/sermon'

const log = loggerService.scope('ChunkUploader')

export type UploadProgressHandler = (fraction: number) => void

export class ChunkUploader {
  constructor(private readonly sync: SermonSync) {}

  /**
   * Returns the chunks with their remote paths set
   */
  async uploadAll(
    chunks: AudioChunk[],
    onProgress: UploadProgressHandler = () => {},
    signal?: AbortSignal
  ): Promise<AudioChunk[]> {
    const ordered = [...chunks].sort((a, b) => a.chunk_index - b.chunk_index)
    const total = ordered.length
    const uploaded: AudioChunk[] = []

    for (const [position, chunk] of ordered.entries()) {
      signal?.throwIfAborted()

      const data = await this.readChunk(chunk)

      let remotePath: string
      try {
        remotePath = await this.sync.uploadChunk(chunk, data)
      } catch (error) {
        log.error('Chunk upload failed', error instanceof Error ? error : { error: String(error) }, {
          sermonId: chunk.sermon_id,
          chunkIndex: chunk.chunk_index
        })
        throw toSermonError(error, SermonErrors.uploadFailed)
      }

      uploaded.push({
        ...chunk,
        remote_path: remotePath,
        upload_status: 'succeeded',
        upload_error: null,
        needs_upload: false
      })
      onProgress((position + 1) / total)
    }

    log.info('All chunks uploaded', { sermonId: ordered[0]?.sermon_id, chunkCount: total })
    return uploaded
  }

  private async readChunk(chunk: AudioChunk): Promise<Buffer> {
    if (!chunk.local_path) {
      throw SermonErrors.chunkNotFound(chunk.chunk_index)
    }
    try {
      return await fs.promises.readFile(chunk.local_path)
    } catch (error) {
      log.warn('Chunk file missing', {
        chunkIndex: chunk.chunk_index,
        path: chunk.local_path,
        error: error instanceof Error ? error.message : String(error)
      })
      throw SermonErrors.chunkNotFound(chunk.chunk_index)
    }
  }
}
