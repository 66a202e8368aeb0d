import axios from 'axios';
import {
  GetTranscriptionJobCommand,
  LanguageCode,
  StartTranscriptionJobCommand,
  TranscribeClient,
  TranscriptionJobStatus,
} from '@aws-sdk/client-transcribe';
import { logger } from '../../config/logger';
import { JobStatus } from '../../types/job.types';
import type { JobStatusSnapshot, RemoteJobClient, SubmitJobRequest } from '../../types/job.types';
import { UnsupportedLanguageError } from '../../utils/errors';

const SUPPORTED_LANGUAGE_CODES: readonly string[] = Object.values(LanguageCode);

export function isLanguageCode(value: string): value is LanguageCode {
  return SUPPORTED_LANGUAGE_CODES.includes(value);
}

/**
 * AWS Transcribe behind the RemoteJobClient capability.
 */
export class TranscribeJobClient implements RemoteJobClient {
  constructor(
    private readonly transcribe: TranscribeClient,
    private readonly fetchTimeoutMs: number = 120_000
  ) {}

  async submit(request: SubmitJobRequest): Promise<void> {
    if (!isLanguageCode(request.languageCode)) {
      throw new UnsupportedLanguageError('aws-transcribe', request.languageCode);
    }

    await this.transcribe.send(
      new StartTranscriptionJobCommand({
        TranscriptionJobName: request.jobName,
        LanguageCode: request.languageCode,
        Media: { MediaFileUri: request.mediaUri },
        Settings: request.showSpeakerLabels
          ? { ShowSpeakerLabels: true, MaxSpeakerLabels: request.maxSpeakerLabels }
          : { ShowSpeakerLabels: false },
      })
    );
  }

  async getStatus(jobName: string): Promise<JobStatusSnapshot> {
    const response = await this.transcribe.send(
      new GetTranscriptionJobCommand({ TranscriptionJobName: jobName })
    );
    const job = response.TranscriptionJob;

    switch (job?.TranscriptionJobStatus) {
      case TranscriptionJobStatus.COMPLETED:
        return {
          status: JobStatus.COMPLETED,
          resultUri: job.Transcript?.TranscriptFileUri,
        };
      case TranscriptionJobStatus.FAILED:
        return { status: JobStatus.FAILED, failureReason: job.FailureReason };
      default:
        return { status: JobStatus.IN_PROGRESS };
    }
  }

  async fetchResult(resultUri: string): Promise<unknown> {
    logger.debug('Fetching transcription result');
    const response = await axios.get<unknown>(resultUri, {
      timeout: this.fetchTimeoutMs,
      responseType: 'json',
    });
    return response.data;
  }
}
