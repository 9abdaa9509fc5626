/**
 * Sermon Sync Service
 *
 * Persists sermons locally and pushes chunk audio to remote storage.
 * Remote objects live at <userId>/<sermonId>/chunk_<index:03>.<ext>, ids
 * lowercased. Chunk upload state is mirrored onto the local chunk rows.
 */

import * as path from 'path'
import { chunkFileName } from './audioCaptureService'
import { contentTypeForPath } from './audioFormats'
import { loggerService } from './loggerService'
import { SermonErrors, toSermonError } from './sermonErrors'
import type { SermonRepository } from './sermonRepository'
import type { RemoteStorage, SermonSync } from '../types/collaborators'
import type { AudioChunk, Sermon } from '../types/sermon'

const log = loggerService.scope('SermonSync')

export function remoteChunkPath(userId: string, sermonId: string, chunk: AudioChunk): string {
  const extension = chunk.local_path ? path.extname(chunk.local_path).toLowerCase() : '.wav'
  return [userId.toLowerCase(), sermonId.toLowerCase(), chunkFileName(chunk.chunk_index, extension || '.wav')].join('/')
}

export class SermonSyncService implements SermonSync {
  constructor(
    private readonly repository: SermonRepository,
    private readonly storage: RemoteStorage
  ) {}

  async createSermon(sermon: Sermon, chunks: AudioChunk[]): Promise<void> {
    this.repository.saveSermonWithChunks(sermon, chunks)
    this.repository.markSynced(sermon.id)
  }

  async uploadChunk(chunk: AudioChunk, data: Buffer): Promise<string> {
    const sermon = this.repository.getSermon(chunk.sermon_id)
    if (!sermon) {
      throw SermonErrors.uploadFailed(`Sermon ${chunk.sermon_id} is not saved`)
    }

    const remotePath = remoteChunkPath(sermon.user_id, sermon.id, chunk)
    const contentType = chunk.local_path ? contentTypeForPath(chunk.local_path) : 'audio/wav'

    try {
      const stored = await this.storage.upload(remotePath, data, contentType)
      this.repository.markChunkUploaded(chunk.id, stored)
      log.info('Chunk uploaded', { sermonId: sermon.id, chunkIndex: chunk.chunk_index, remotePath: stored })
      return stored
    } catch (error) {
      const failure = toSermonError(error, SermonErrors.uploadFailed)
      this.repository.markChunkUploadFailed(chunk.id, failure.message)
      throw failure
    }
  }

  async loadSermon(sermonId: string): Promise<Sermon | null> {
    return this.repository.getSermon(sermonId)
  }
}
