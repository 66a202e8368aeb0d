import fsp from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { createAwsClients } from '../config/aws';
import { logger } from '../config/logger';
import type { Settings } from '../config/settings';
import type { DiarizationResponse, TranscriptSegment } from '../types/transcript.types';
import { UnsupportedLanguageError } from '../utils/errors';
import { resolveCommand } from '../utils/run-command';
import { align, attributeByProviderLabels, mergeWords } from '../utils/speaker-alignment';
import { SpeakerLabelMap } from '../utils/speaker-labels';
import { RequestArtifacts } from './artifacts';
import ffmpegService, { type IAudioNormalizer } from './audio/ffmpeg.service';
import type { IDiarizer } from './diarization/diarizer.interface';
import { PyannoteDiarizer } from './diarization/pyannote-diarizer';
import { S3StorageService } from './storage/s3-storage.service';
import { getTranscriptionProvider } from './transcription/transcription.factory';
import type {
  ITranscriptionProvider,
  TranscriptionContext,
} from './transcription/transcription-provider.interface';

/**
 * Where speaker attribution comes from.
 *  - local:    our own diarization timeline, words matched by containment
 *  - provider: the remote engine's speaker tags, no local diarization
 */
export type SpeakerSource = 'local' | 'provider';

export interface DiarizationServiceDeps {
  normalizer: IAudioNormalizer;
  transcriber: ITranscriptionProvider;
  diarizer?: IDiarizer;
  speakerSource: SpeakerSource;
  tempDir: string;
  languageCode: string;
  maxSpeakers: number;
  generateId?: () => string;
}

export interface ProcessAudioOptions {
  languageCode?: string;
  maxSpeakers?: number;
}

export class DiarizationService {
  private readonly generateId: () => string;

  constructor(private readonly deps: DiarizationServiceDeps) {
    if (deps.speakerSource === 'local' && !deps.diarizer) {
      throw new Error('A diarizer is required when speakers come from local diarization');
    }
    if (deps.speakerSource === 'provider' && !deps.transcriber.supportsSpeakerLabels) {
      throw new Error(`Transcription provider "${deps.transcriber.name}" cannot label speakers`);
    }
    if (!deps.transcriber.supportsLanguage(deps.languageCode)) {
      throw new UnsupportedLanguageError(deps.transcriber.name, deps.languageCode);
    }
    this.generateId = deps.generateId ?? (() => uuidv4());
  }

  /**
   * Run the whole pipeline for one upload: persist, normalize, diarize,
   * transcribe, align. Transient files and remote objects are removed on
   * the way out whether or not processing succeeded.
   */
  async processAudio(
    audio: Buffer,
    filename: string,
    options: ProcessAudioOptions = {}
  ): Promise<DiarizationResponse> {
    const languageCode = options.languageCode ?? this.deps.languageCode;
    if (!this.deps.transcriber.supportsLanguage(languageCode)) {
      throw new UnsupportedLanguageError(this.deps.transcriber.name, languageCode);
    }

    const requestId = this.generateId();
    const artifacts = new RequestArtifacts(requestId);
    const { tempDir } = this.deps;
    const startedAt = Date.now();

    try {
      await fsp.mkdir(tempDir, { recursive: true });

      const sourcePath = artifacts.trackFile(
        path.join(tempDir, `${requestId}.source${path.extname(filename)}`)
      );
      const wavPath = artifacts.trackFile(path.join(tempDir, `${requestId}.wav`));

      logger.info(`[${requestId}] Processing ${filename} (${audio.length} bytes)`);
      await fsp.writeFile(sourcePath, audio);
      await this.deps.normalizer.convertToWav(sourcePath, wavPath);

      const context: TranscriptionContext = {
        requestId,
        wavPath,
        workDir: tempDir,
        artifacts,
        languageCode,
        withSpeakerLabels: this.deps.speakerSource === 'provider',
        maxSpeakers: options.maxSpeakers ?? this.deps.maxSpeakers,
      };

      const transcription =
        this.deps.speakerSource === 'local'
          ? await this.transcribeWithLocalDiarization(context)
          : await this.transcribeWithProviderLabels(context);

      logger.info(`[${requestId}] Produced ${transcription.length} segments in ${Date.now() - startedAt}ms`);
      return { transcription };
    } finally {
      await artifacts.cleanup();
    }
  }

  private async transcribeWithLocalDiarization(context: TranscriptionContext): Promise<TranscriptSegment[]> {
    const { diarizer, transcriber } = this.deps;
    if (!diarizer) {
      throw new Error('Diarizer not configured');
    }

    logger.info(`[${context.requestId}] Running diarization with ${diarizer.name}`);
    const timeline = await diarizer.diarize(context.wavPath);

    logger.info(`[${context.requestId}] Running transcription with ${transcriber.name}`);
    const { stream } = await transcriber.transcribe(context);

    return align(timeline, stream);
  }

  private async transcribeWithProviderLabels(context: TranscriptionContext): Promise<TranscriptSegment[]> {
    const { transcriber } = this.deps;

    logger.info(`[${context.requestId}] Running transcription with ${transcriber.name} speaker labels`);
    const { stream, providerLabels = [] } = await transcriber.transcribe(context);

    const labels = new SpeakerLabelMap();
    const words = attributeByProviderLabels(stream.words, providerLabels, (label) => labels.resolve(label));
    logger.debug(`[${context.requestId}] Provider speakers`, { speakers: Object.fromEntries(labels.entries()) });

    return mergeWords(words, stream.join);
  }
}

/**
 * Build the service and its process-wide collaborators from settings.
 * Bootstraps the S3 bucket when transcription runs on AWS.
 */
export async function createDiarizationService(settings: Settings): Promise<DiarizationService> {
  let transcriber: ITranscriptionProvider;

  if (settings.TRANSCRIPTION_PROVIDER === 'aws') {
    if (!settings.S3_BUCKET_NAME) {
      throw new Error('S3_BUCKET_NAME is required for AWS Transcribe');
    }
    const clients = createAwsClients(settings);
    const storage = new S3StorageService(clients.s3, settings.S3_BUCKET_NAME, settings.AWS_REGION);
    await storage.ensureBucket();
    transcriber = getTranscriptionProvider(settings, { ...clients, storage });
  } else {
    transcriber = getTranscriptionProvider(settings);
  }

  const diarizer =
    settings.SPEAKER_SOURCE === 'local'
      ? new PyannoteDiarizer({
          command: resolveCommand(settings.DIARIZATION_COMMAND),
          model: settings.DIARIZATION_MODEL,
          huggingFaceToken: settings.HUGGING_FACE_TOKEN,
        })
      : undefined;

  return new DiarizationService({
    normalizer: ffmpegService,
    transcriber,
    diarizer,
    speakerSource: settings.SPEAKER_SOURCE,
    tempDir: path.resolve(settings.TEMP_DIR),
    languageCode: settings.LANGUAGE_CODE,
    maxSpeakers: settings.MAX_SPEAKER_LABELS,
  });
}
