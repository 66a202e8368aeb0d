import { AppError } from '../middleware/errorHandler';

/** Upload rejected before any resource was allocated. */
export class InvalidUploadError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Requested language the selected transcription provider cannot handle. */
export class UnsupportedLanguageError extends AppError {
  readonly languageCode: string;

  constructor(provider: string, languageCode: string) {
    super(`Unsupported language code for ${provider}: ${languageCode}`, 400);
    this.languageCode = languageCode;
  }
}

/** The remote job never reached a terminal state within the ceiling. */
export class JobTimeoutError extends AppError {
  readonly jobName: string;
  readonly timeoutMs: number;

  constructor(jobName: string, timeoutMs: number) {
    super(`Transcription job ${jobName} timed out after ${Math.round(timeoutMs / 1000)}s`, 500);
    this.jobName = jobName;
    this.timeoutMs = timeoutMs;
  }
}

/** The remote job terminated with a failure status. */
export class JobExecutionError extends AppError {
  readonly jobName: string;
  readonly reason: string;

  constructor(jobName: string, reason: string) {
    super(`Transcription job failed with reason: ${reason}`, 500);
    this.jobName = jobName;
    this.reason = reason;
  }
}

/** A collaborator returned output we could not parse. */
export class CollaboratorOutputError extends AppError {
  readonly collaborator: string;

  constructor(collaborator: string, detail: string) {
    super(`${collaborator} returned malformed output: ${detail}`, 500);
    this.collaborator = collaborator;
  }
}

/**
 * A transient artifact was already gone at cleanup time.
 * Internal only; never reaches a caller.
 */
export class TransientArtifactCleanupError extends Error {
  readonly artifact: string;

  constructor(artifact: string, options?: { cause?: unknown }) {
    super(`Transient artifact already absent: ${artifact}`, options);
    this.name = 'TransientArtifactCleanupError';
    this.artifact = artifact;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
