/**
 * Sermon Repository
 *
 * Local source of truth for sermons and everything hanging off them: chunk
 * records, processing statuses, transcript, study guide and bookmarks.
 */

import { audioChunkService } from './audioChunkService'
import { bookmarkService } from './bookmarkService'
import { getDatabaseService } from './database'
import { loggerService } from './loggerService'
import { sermonContentService } from './sermonContentService'
import { sermonService } from './sermonService'
import type { SermonContentReader } from '../types/collaborators'
import type {
  AudioChunk,
  CreateBookmarkInput,
  ProcessingJob,
  SaveStudyGuideInput,
  SaveTranscriptInput,
  Sermon,
  SermonBookmark,
  StudyGuide,
  Transcript
} from '../types/sermon'

const log = loggerService.scope('SermonRepository')

export class SermonRepository implements SermonContentReader {
  /**
   * Persist a sermon and its chunk records atomically
   */
  saveSermonWithChunks(sermon: Sermon, chunks: AudioChunk[]): { sermon: Sermon; chunks: AudioChunk[] } {
    const saved = getDatabaseService().transaction(() => ({
      sermon: sermonService.insert(sermon),
      chunks: audioChunkService.insertMany(chunks)
    }))

    log.info('Sermon saved', { sermonId: sermon.id, chunkCount: chunks.length })
    return saved
  }

  getSermon(sermonId: string): Sermon | null {
    return sermonService.getById(sermonId)
  }

  listSermons(userId: string): Sermon[] {
    return sermonService.getByUserId(userId)
  }

  getChunks(sermonId: string): AudioChunk[] {
    return audioChunkService.getBySermonId(sermonId)
  }

  /**
   * Mirror the remote job record onto the sermon row
   */
  applyJobStatus(job: ProcessingJob): Sermon | null {
    return sermonService.update(job.sermonId, {
      transcription_status: job.transcriptionStatus,
      transcription_error: job.transcriptionError,
      study_guide_status: job.studyGuideStatus,
      study_guide_error: job.studyGuideError
    })
  }

  markChunkUploaded(chunkId: string, remotePath: string): AudioChunk | null {
    return audioChunkService.markUploaded(chunkId, remotePath)
  }

  markChunkUploadFailed(chunkId: string, error: string): AudioChunk | null {
    return audioChunkService.markUploadFailed(chunkId, error)
  }

  markSynced(sermonId: string): Sermon | null {
    return sermonService.update(sermonId, { needs_sync: false })
  }

  getSermonsNeedingSync(): Sermon[] {
    return sermonService.getNeedingSync()
  }

  saveTranscript(input: SaveTranscriptInput): Transcript {
    return sermonContentService.saveTranscript(input)
  }

  fetchTranscript(sermonId: string): Transcript | null {
    return sermonContentService.fetchTranscript(sermonId)
  }

  saveStudyGuide(input: SaveStudyGuideInput): StudyGuide {
    return sermonContentService.saveStudyGuide(input)
  }

  fetchStudyGuide(sermonId: string): StudyGuide | null {
    return sermonContentService.fetchStudyGuide(sermonId)
  }

  addBookmark(input: CreateBookmarkInput): SermonBookmark {
    return bookmarkService.create(input)
  }

  getBookmarks(sermonId: string): SermonBookmark[] {
    return bookmarkService.getBySermonId(sermonId)
  }
}

export const sermonRepository = new SermonRepository()

export default sermonRepository
