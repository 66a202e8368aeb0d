export enum JobStatus {
  SUBMITTED = 'SUBMITTED',
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  TIMED_OUT = 'TIMED_OUT',
}

export interface JobRecord {
  jobName: string;
  status: JobStatus;
  resultUri?: string;
  failureReason?: string;
}

export interface SubmitJobRequest {
  jobName: string;
  languageCode: string;
  mediaUri: string;
  /** Ask the provider to label speakers itself. */
  showSpeakerLabels: boolean;
  maxSpeakerLabels?: number;
}

/** Status snapshot as reported by the provider, already mapped to our states. */
export interface JobStatusSnapshot {
  status: JobStatus.IN_PROGRESS | JobStatus.COMPLETED | JobStatus.FAILED;
  resultUri?: string;
  failureReason?: string;
}

/**
 * Capability of a remote, poll-based transcription backend.
 */
export interface RemoteJobClient {
  submit(request: SubmitJobRequest): Promise<void>;
  getStatus(jobName: string): Promise<JobStatusSnapshot>;
  fetchResult(resultUri: string): Promise<unknown>;
}
