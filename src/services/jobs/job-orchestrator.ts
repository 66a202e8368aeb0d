import { logger } from '../../config/logger';
import { JobStatus } from '../../types/job.types';
import type { JobRecord, RemoteJobClient, SubmitJobRequest } from '../../types/job.types';
import { JobExecutionError, JobTimeoutError } from '../../utils/errors';

// ===========================================================================
// Job Orchestrator
//
// Drives one remote transcription job:
//
//   SUBMITTED -> IN_PROGRESS -> COMPLETED -> fetch result
//                            -> FAILED    -> JobExecutionError
//                            -> (ceiling) -> JobTimeoutError
//
// The remote job is never cancelled; a timed-out job is simply abandoned.
// ===========================================================================

export interface PollPolicy {
  pollIntervalMs: number;
  timeoutMs: number;
}

export const DEFAULT_POLL_POLICY: PollPolicy = {
  pollIntervalMs: 5_000,
  timeoutMs: 600_000,
};

export interface Clock {
  now(): number;
}

export type Sleep = (ms: number) => Promise<void>;

export const systemClock: Clock = { now: () => Date.now() };

export const delay: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface JobRunResult {
  record: JobRecord;
  payload: unknown;
}

export class JobOrchestrator {
  constructor(
    private readonly client: RemoteJobClient,
    private readonly policy: PollPolicy = DEFAULT_POLL_POLICY,
    private readonly clock: Clock = systemClock,
    private readonly sleep: Sleep = delay
  ) {}

  /**
   * Submit the job, poll it to a terminal state and return the raw result
   * payload. Rejects with JobTimeoutError or JobExecutionError.
   */
  async run(request: SubmitJobRequest): Promise<JobRunResult> {
    const { jobName } = request;

    await this.client.submit(request);
    const record: JobRecord = { jobName, status: JobStatus.SUBMITTED };
    logger.info(`Transcription job ${jobName} submitted`, {
      languageCode: request.languageCode,
      showSpeakerLabels: request.showSpeakerLabels,
    });

    await this.pollUntilTerminal(record);

    if (record.status === JobStatus.FAILED) {
      const reason = record.failureReason || 'Unknown';
      logger.error(`Transcription job ${jobName} failed with reason: ${reason}`);
      throw new JobExecutionError(jobName, reason);
    }

    if (!record.resultUri) {
      logger.error(`Transcription job ${jobName} completed without a transcript location`);
      throw new JobExecutionError(jobName, 'Missing transcript location');
    }

    logger.info(`Transcription job ${jobName} completed, fetching result`);
    const payload = await this.client.fetchResult(record.resultUri);
    return { record, payload };
  }

  private async pollUntilTerminal(record: JobRecord): Promise<void> {
    const startedAt = this.clock.now();
    let attempts = 0;

    while (this.clock.now() - startedAt < this.policy.timeoutMs) {
      attempts++;
      const snapshot = await this.client.getStatus(record.jobName);

      record.status = snapshot.status;
      record.resultUri = snapshot.resultUri;
      record.failureReason = snapshot.failureReason;

      if (snapshot.status === JobStatus.COMPLETED || snapshot.status === JobStatus.FAILED) {
        logger.debug(`Transcription job ${record.jobName} reached ${snapshot.status} after ${attempts} polls`);
        return;
      }

      await this.sleep(this.policy.pollIntervalMs);
    }

    record.status = JobStatus.TIMED_OUT;
    logger.error(`Transcription job ${record.jobName} timed out after ${attempts} polls`);
    throw new JobTimeoutError(record.jobName, this.policy.timeoutMs);
  }
}
