import type { Settings } from '../../config/settings';
import type { AwsClients } from '../../config/aws';
import { JobOrchestrator } from '../jobs/job-orchestrator';
import { TranscribeJobClient } from '../jobs/transcribe-job.client';
import type { S3StorageService } from '../storage/s3-storage.service';
import { AwsTranscribeTranscriber } from './aws-transcribe.transcriber';
import type { ITranscriptionProvider } from './transcription-provider.interface';
import { WhisperTranscriber } from './whisper.transcriber';
import { resolveCommand } from '../../utils/run-command';
import { logger } from '../../config/logger';

/**
 * Instantiates the transcription provider selected by TRANSCRIPTION_PROVIDER.
 */
export const getTranscriptionProvider = (
  settings: Settings,
  aws?: AwsClients & { storage: S3StorageService }
): ITranscriptionProvider => {
  switch (settings.TRANSCRIPTION_PROVIDER) {
    case 'aws': {
      if (!aws) {
        throw new Error('AWS clients are required for TRANSCRIPTION_PROVIDER=aws');
      }
      logger.info('Using AWS Transcribe for transcription');
      const orchestrator = new JobOrchestrator(new TranscribeJobClient(aws.transcribe), {
        pollIntervalMs: settings.TRANSCRIBE_POLL_INTERVAL_MS,
        timeoutMs: settings.TRANSCRIBE_JOB_TIMEOUT_MS,
      });
      return new AwsTranscribeTranscriber(aws.storage, orchestrator);
    }

    case 'whisper':
      logger.info(`Using local Whisper (${settings.WHISPER_MODEL}) for transcription`);
      return new WhisperTranscriber({
        command: resolveCommand(settings.WHISPER_COMMAND),
        model: settings.WHISPER_MODEL,
      });
  }
};
