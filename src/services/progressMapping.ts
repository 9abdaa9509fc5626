/**
 * Processing steps and the mapping from the remote job's composite progress
 * fraction to the step shown while a sermon is processed.
 *
 * Composite ranges:
 *   [0.00, 0.20)  uploading      progress = f / 0.20
 *   [0.20, 0.70)  transcribing   progress = (f - 0.20) / 0.50
 *   [0.70, 0.75)  moderating
 *   [0.75, 0.95)  analyzing
 *   [0.95, 1.00]  saving
 */

export type ProcessingStep =
  | { kind: 'uploading'; progress: number }
  | { kind: 'transcribing'; progress: number; chunk: number; total: number }
  | { kind: 'moderating' }
  | { kind: 'analyzing' }
  | { kind: 'saving' }

const UPLOAD_END = 0.2
const TRANSCRIBE_END = 0.7
const TRANSCRIBE_SPAN = 0.5
const MODERATE_END = 0.75
const ANALYZE_END = 0.95

export const ProcessingSteps = {
  uploading: (progress: number): ProcessingStep => ({ kind: 'uploading', progress }),
  transcribing: (progress: number, chunk: number, total: number): ProcessingStep => ({
    kind: 'transcribing',
    progress,
    chunk,
    total
  }),
  moderating: (): ProcessingStep => ({ kind: 'moderating' }),
  analyzing: (): ProcessingStep => ({ kind: 'analyzing' }),
  saving: (): ProcessingStep => ({ kind: 'saving' })
}

export function stepDisplayName(step: ProcessingStep): string {
  switch (step.kind) {
    case 'uploading':
      return 'Uploading audio...'
    case 'transcribing':
      return step.total > 1
        ? `Transcribing (chunk ${step.chunk} of ${step.total})...`
        : 'Transcribing audio...'
    case 'moderating':
      return 'Reviewing content...'
    case 'analyzing':
      return 'Generating study guide...'
    case 'saving':
      return 'Saving...'
  }
}

/**
 * Overall 0-1 progress of a step
 */
export function stepProgress(step: ProcessingStep): number {
  switch (step.kind) {
    case 'uploading':
      return step.progress * UPLOAD_END
    case 'transcribing':
      return UPLOAD_END + step.progress * TRANSCRIBE_SPAN
    case 'moderating':
      return MODERATE_END
    case 'analyzing':
      return 0.85
    case 'saving':
      return ANALYZE_END
  }
}

/**
 * Map a composite fraction onto a step. chunkTotal is clamped to at least 1.
 */
export function mapCompositeProgress(fraction: number, chunkTotal: number): ProcessingStep {
  const f = Math.min(Math.max(fraction, 0), 1)
  const total = Math.max(1, chunkTotal)

  if (f < UPLOAD_END) {
    return ProcessingSteps.uploading(f / UPLOAD_END)
  }
  if (f < TRANSCRIBE_END) {
    const t = (f - UPLOAD_END) / TRANSCRIBE_SPAN
    const chunk = Math.min(Math.floor(t * total) + 1, total)
    return ProcessingSteps.transcribing(t, chunk, total)
  }
  if (f < MODERATE_END) {
    return ProcessingSteps.moderating()
  }
  if (f < ANALYZE_END) {
    return ProcessingSteps.analyzing()
  }
  return ProcessingSteps.saving()
}
