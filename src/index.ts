/**
 * Sermon capture
 *
 * createSermonCapture() opens the database, loads the configuration and
 * wires the default collaborators around a FlowOrchestrator. Any
 * collaborator can be replaced through the options.
 */

import { AudioCaptureService } from './services/audioCaptureService'
import { getDatabaseService } from './services/database'
import { FlowOrchestrator } from './services/flowOrchestrator'
import { ImportValidator } from './services/importValidator'
import { createLocalAuthProvider } from './services/localAuthProvider'
import { loggerService } from './services/loggerService'
import {
  createSystemMicrophone,
  systemMicrophonePermission,
  type MicrophoneSource
} from './services/microphoneSource'
import { LocalProcessingJobQueue, type SermonProcessor } from './services/processingJobQueue'
import { SermonApiClient } from './services/sermonApiClient'
import {
  loadEnvFile,
  loadSermonConfig,
  validateSermonConfig,
  type SermonCaptureConfig
} from './services/sermonConfig'
import { sermonRepository } from './services/sermonRepository'
import { SermonSyncService } from './services/sermonSyncService'
import type {
  AuthProvider,
  PermissionProvider,
  ProcessingJobQueue,
  RemoteStorage,
  SourceAccess
} from './types/collaborators'

const log = loggerService.scope('SermonCapture')

export interface SermonApiOptions {
  baseUrl: string
  getAccessToken?: () => string | null
  fetchImpl?: typeof fetch
}

export interface SermonCaptureOptions {
  /** .env file to load first; defaults to `.env` in the working directory */
  envFile?: string
  /** Database file; ':memory:' for an in-process database */
  databasePath?: string
  config?: Partial<SermonCaptureConfig>
  auth?: AuthProvider
  /** Remote backend used for storage and processing when set */
  api?: SermonApiOptions
  /** Runs processing in-process instead of on the backend */
  processor?: SermonProcessor
  storage?: RemoteStorage
  jobQueue?: ProcessingJobQueue
  microphone?: MicrophoneSource
  permission?: PermissionProvider
  sourceAccess?: SourceAccess
}

export interface SermonCapture {
  orchestrator: FlowOrchestrator
  config: SermonCaptureConfig
  jobQueue: ProcessingJobQueue
  close(): void
}

export function createSermonCapture(options: SermonCaptureOptions = {}): SermonCapture {
  loadEnvFile(options.envFile)

  const database = getDatabaseService()
  if (!database.isInitialized()) {
    database.initialize(options.databasePath)
  }

  const config = validateSermonConfig(loadSermonConfig(options.config))
  const client = options.api ? new SermonApiClient(options.api) : null

  const storage = options.storage ?? client
  if (!storage) {
    throw new Error('Sermon capture needs remote storage: pass `api` or `storage`')
  }

  const jobQueue =
    options.jobQueue ??
    client ??
    (options.processor
      ? new LocalProcessingJobQueue({ repository: sermonRepository, processor: options.processor })
      : null)
  if (!jobQueue) {
    throw new Error('Sermon capture needs a job queue: pass `api`, `processor` or `jobQueue`')
  }

  const permission = options.permission ?? systemMicrophonePermission
  const capture = new AudioCaptureService({
    recordingsDir: config.recordingsDir,
    microphone: options.microphone ?? createSystemMicrophone(),
    permission
  })

  const orchestrator = new FlowOrchestrator({
    auth: options.auth ?? createLocalAuthProvider(),
    capture,
    importValidator: new ImportValidator({
      recordingsDir: config.recordingsDir,
      maxSizeMB: config.maxImportSizeMB,
      sourceAccess: options.sourceAccess
    }),
    sync: new SermonSyncService(sermonRepository, storage),
    jobQueue,
    content: sermonRepository,
    records: sermonRepository,
    config
  })

  log.info('Sermon capture ready', { recordingsDir: config.recordingsDir, remote: client !== null })

  return {
    orchestrator,
    config,
    jobQueue,
    close: () => {
      database.close()
    }
  }
}

export { FlowOrchestrator } from './services/flowOrchestrator'
export type { BookmarkOptions, FlowOrchestratorOptions, SermonRecordStore } from './services/flowOrchestrator'
export { AudioCaptureService, chunkFileName } from './services/audioCaptureService'
export { AudioLevelHistory } from './services/audioLevelHistory'
export { ChunkUploader } from './services/chunkUploader'
export { ImportValidator } from './services/importValidator'
export { LocalProcessingJobQueue } from './services/processingJobQueue'
export type { SermonProcessor, StudyGuideOutput, TranscriptionOutput } from './services/processingJobQueue'
export { ProgressPublisher } from './services/progressPublisher'
export { SermonApiClient, parseSseEvents } from './services/sermonApiClient'
export { SermonSyncService, remoteChunkPath } from './services/sermonSyncService'
export { SerialTaskQueue } from './services/serialTaskQueue'
export { SermonRepository, sermonRepository } from './services/sermonRepository'
export { SermonError, SermonErrorCodes, SermonErrors, isSermonError, toSermonError } from './services/sermonErrors'
export { createLocalAuthProvider, createStaticAuthProvider } from './services/localAuthProvider'
export { DEFAULT_SERMON_CONFIG, loadEnvFile, loadSermonConfig } from './services/sermonConfig'
export type { SermonCaptureConfig } from './services/sermonConfig'
export * from './services/flowState'
export * from './services/progressMapping'
export * from './services/sermonStatus'
export { createFlowStore, subscribeToPhase } from './stores/flow-store'
export type { FlowStore } from './stores/flow-store'
export type * from './types/collaborators'
export type * from './types/sermon'
