import fsp from 'fs/promises';
import { logger } from '../../config/logger';
import type { JobOrchestrator } from '../jobs/job-orchestrator';
import type { S3StorageService } from '../storage/s3-storage.service';
import { isLanguageCode } from '../jobs/transcribe-job.client';
import { parseTranscribeResult } from './transcribe-result.parser';
import type {
  ITranscriptionProvider,
  TranscriptionContext,
  TranscriptionOutput,
} from './transcription-provider.interface';

export const UPLOAD_PREFIX = 'uploads';
export const JOB_NAME_PREFIX = 'diarization';

// ===========================================================================
// AWS Transcribe provider
//
// Upload WAV to S3 -> run the job through the orchestrator -> parse the
// transcript JSON. The S3 object is registered as a request artifact before
// the upload starts, so the coordinator removes it whatever happens.
// ===========================================================================

export class AwsTranscribeTranscriber implements ITranscriptionProvider {
  readonly name = 'aws-transcribe';
  readonly supportsSpeakerLabels = true;

  constructor(
    private readonly storage: Pick<S3StorageService, 'putObject' | 'deleteObject' | 'toUri'>,
    private readonly orchestrator: Pick<JobOrchestrator, 'run'>
  ) {}

  supportsLanguage(languageCode: string): boolean {
    return isLanguageCode(languageCode);
  }

  async transcribe(context: TranscriptionContext): Promise<TranscriptionOutput> {
    const { requestId, wavPath, artifacts } = context;
    const objectKey = `${UPLOAD_PREFIX}/${requestId}.wav`;
    const jobName = `${JOB_NAME_PREFIX}-${requestId}`;

    artifacts.trackObject(this.storage.toUri(objectKey), () => this.storage.deleteObject(objectKey));
    await this.storage.putObject(objectKey, await fsp.readFile(wavPath));
    logger.info(`[${requestId}] Audio uploaded for transcription job ${jobName}`);

    const { payload } = await this.orchestrator.run({
      jobName,
      languageCode: context.languageCode,
      mediaUri: this.storage.toUri(objectKey),
      showSpeakerLabels: context.withSpeakerLabels,
      maxSpeakerLabels: context.withSpeakerLabels ? context.maxSpeakers : undefined,
    });

    const { stream, providerLabels } = parseTranscribeResult(payload);
    logger.info(`[${requestId}] AWS Transcribe produced ${stream.words.length} words`);

    return context.withSpeakerLabels ? { stream, providerLabels } : { stream };
  }
}
