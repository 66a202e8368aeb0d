import type { WordStream } from '../../types/transcript.types';
import type { RequestArtifacts } from '../artifacts';

/** Everything a provider needs to transcribe one request. */
export interface TranscriptionContext {
  requestId: string;
  /** Canonical mono 16 kHz WAV. */
  wavPath: string;
  /** Directory the provider may write intermediate files to. */
  workDir: string;
  /** Register every file or object the provider creates here. */
  artifacts: RequestArtifacts;
  languageCode: string;
  /** Ask the provider for its own speaker tags. */
  withSpeakerLabels: boolean;
  maxSpeakers?: number;
}

export interface TranscriptionOutput {
  stream: WordStream;
  /** Provider speaker tag per word, present when speaker labels were requested. */
  providerLabels?: (string | undefined)[];
}

/**
 * Interface that every transcription backend must implement.
 */
export interface ITranscriptionProvider {
  readonly name: string;
  /** Whether the provider can tag speakers itself. */
  readonly supportsSpeakerLabels: boolean;
  /** Checked before any work is done for a request. */
  supportsLanguage(languageCode: string): boolean;
  transcribe(context: TranscriptionContext): Promise<TranscriptionOutput>;
}
