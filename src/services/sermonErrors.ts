/**
 * Sermon Errors
 *
 * Every failure the capture/processing flow can surface. Each error carries
 * a stable code plus the context needed to render a message and to decide
 * whether the user may retry.
 */

export const SermonErrorCodes = {
  /** No signed-in user */
  NOT_AUTHENTICATED: 'NOT_AUTHENTICATED',

  /** Microphone access was not granted */
  MICROPHONE_PERMISSION_DENIED: 'MICROPHONE_PERMISSION_DENIED',

  /** Device or capture session failure */
  RECORDING_FAILED: 'RECORDING_FAILED',

  /** Stop requested before the minimum recording duration */
  RECORDING_TOO_SHORT: 'RECORDING_TOO_SHORT',

  /** Imported file exceeds the size limit */
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',

  /** Imported file container is not in the allow-list */
  UNSUPPORTED_AUDIO_FORMAT: 'UNSUPPORTED_AUDIO_FORMAT',

  /** Imported file could not be read, measured or copied */
  IMPORT_FAILED: 'IMPORT_FAILED',

  /** A chunk has no local file at upload time */
  CHUNK_NOT_FOUND: 'CHUNK_NOT_FOUND',

  /** Remote storage rejected a chunk */
  UPLOAD_FAILED: 'UPLOAD_FAILED',

  /** Remote transcription failed; the transcript is unusable */
  TRANSCRIPTION_FAILED: 'TRANSCRIPTION_FAILED',

  /** Remote study-guide generation failed */
  STUDY_GUIDE_GENERATION_FAILED: 'STUDY_GUIDE_GENERATION_FAILED',

  /** No terminal progress update arrived within the processing window */
  PROCESSING_TIMEOUT: 'PROCESSING_TIMEOUT'
} as const

export type SermonErrorCode = typeof SermonErrorCodes[keyof typeof SermonErrorCodes]

export interface SermonErrorDetails {
  reason?: string
  actualSeconds?: number
  minimumSeconds?: number
  maxMB?: number
  typeIdentifier?: string
  chunkIndex?: number
  [key: string]: unknown
}

const RETRYABLE_CODES: ReadonlySet<SermonErrorCode> = new Set<SermonErrorCode>([
  SermonErrorCodes.RECORDING_FAILED,
  SermonErrorCodes.UPLOAD_FAILED,
  SermonErrorCodes.STUDY_GUIDE_GENERATION_FAILED,
  SermonErrorCodes.PROCESSING_TIMEOUT
])

export class SermonError extends Error {
  readonly code: SermonErrorCode
  readonly details: SermonErrorDetails

  constructor(code: SermonErrorCode, message: string, details: SermonErrorDetails = {}) {
    super(message)
    this.name = 'SermonError'
    this.code = code
    this.details = details
  }

  get isRetryable(): boolean {
    return RETRYABLE_CODES.has(this.code)
  }

  /**
   * Short text suitable for an alert body.
   */
  get userMessage(): string {
    switch (this.code) {
      case SermonErrorCodes.NOT_AUTHENTICATED:
        return 'Please sign in to record sermons.'
      case SermonErrorCodes.MICROPHONE_PERMISSION_DENIED:
        return 'Microphone access is required to record sermons.'
      case SermonErrorCodes.RECORDING_TOO_SHORT:
        return `Recordings must be at least ${this.details.minimumSeconds ?? 0} seconds long.`
      case SermonErrorCodes.FILE_TOO_LARGE:
        return `Audio files must be smaller than ${this.details.maxMB ?? 0} MB.`
      case SermonErrorCodes.UNSUPPORTED_AUDIO_FORMAT:
        return 'This audio format is not supported. Try MP3, M4A or WAV.'
      case SermonErrorCodes.PROCESSING_TIMEOUT:
        return 'Processing is taking longer than expected. Please try again.'
      case SermonErrorCodes.CHUNK_NOT_FOUND:
        return 'Part of the recording could not be found on this device.'
      default:
        return this.message
    }
  }

  toJSON(): { code: string; message: string; details: SermonErrorDetails } {
    return {
      code: this.code,
      message: this.message,
      details: this.details
    }
  }
}

/**
 * Factories so call sites never spell codes and messages by hand.
 */
export const SermonErrors = {
  notAuthenticated: () =>
    new SermonError(SermonErrorCodes.NOT_AUTHENTICATED, 'User is not authenticated'),

  microphonePermissionDenied: () =>
    new SermonError(SermonErrorCodes.MICROPHONE_PERMISSION_DENIED, 'Microphone permission denied'),

  recordingFailed: (reason: string) =>
    new SermonError(SermonErrorCodes.RECORDING_FAILED, `Recording failed: ${reason}`, { reason }),

  recordingTooShort: (actualSeconds: number, minimumSeconds: number) =>
    new SermonError(
      SermonErrorCodes.RECORDING_TOO_SHORT,
      `Recording is too short (${actualSeconds}s, minimum ${minimumSeconds}s)`,
      { actualSeconds, minimumSeconds }
    ),

  fileTooLarge: (maxMB: number) =>
    new SermonError(SermonErrorCodes.FILE_TOO_LARGE, `File exceeds ${maxMB} MB`, { maxMB }),

  unsupportedAudioFormat: (typeIdentifier: string) =>
    new SermonError(
      SermonErrorCodes.UNSUPPORTED_AUDIO_FORMAT,
      `Unsupported audio format: ${typeIdentifier}`,
      { typeIdentifier }
    ),

  importFailed: (reason: string) =>
    new SermonError(SermonErrorCodes.IMPORT_FAILED, `Import failed: ${reason}`, { reason }),

  chunkNotFound: (chunkIndex?: number) =>
    new SermonError(
      SermonErrorCodes.CHUNK_NOT_FOUND,
      chunkIndex === undefined ? 'Audio chunk not found' : `Audio chunk ${chunkIndex} not found`,
      chunkIndex === undefined ? {} : { chunkIndex }
    ),

  uploadFailed: (reason: string) =>
    new SermonError(SermonErrorCodes.UPLOAD_FAILED, `Upload failed: ${reason}`, { reason }),

  transcriptionFailed: (reason: string) =>
    new SermonError(SermonErrorCodes.TRANSCRIPTION_FAILED, `Transcription failed: ${reason}`, { reason }),

  studyGuideGenerationFailed: (reason: string) =>
    new SermonError(
      SermonErrorCodes.STUDY_GUIDE_GENERATION_FAILED,
      `Study guide generation failed: ${reason}`,
      { reason }
    ),

  processingTimeout: () =>
    new SermonError(SermonErrorCodes.PROCESSING_TIMEOUT, 'Processing timed out')
}

export function isSermonError(error: unknown): error is SermonError {
  return error instanceof SermonError
}

/**
 * Normalize anything thrown into a SermonError, wrapping foreign errors with
 * the supplied factory.
 */
export function toSermonError(error: unknown, fallback: (reason: string) => SermonError): SermonError {
  if (error instanceof SermonError) {
    return error
  }
  const reason = error instanceof Error ? error.message : String(error)
  return fallback(reason)
}
