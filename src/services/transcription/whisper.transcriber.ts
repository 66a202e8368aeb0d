import fsp from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../config/logger';
import type { TimedWord } from '../../types/transcript.types';
import { CollaboratorOutputError, errorMessage } from '../../utils/errors';
import { runCommand, type CommandRunner } from '../../utils/run-command';
import type {
  ITranscriptionProvider,
  TranscriptionContext,
  TranscriptionOutput,
} from './transcription-provider.interface';

const WhisperOutputSchema = z.object({
  segments: z.array(
    z.object({
      words: z
        .array(
          z.object({
            word: z.string(),
            start: z.number(),
            end: z.number(),
          })
        )
        .default([]),
    })
  ),
});

export interface WhisperTranscriberOptions {
  command: string;
  model: string;
  timeoutMs?: number;
}

/** Whisper wants ISO 639-1 ("ja"), requests carry BCP 47 ("ja-JP"). */
export function toWhisperLanguage(languageCode: string): string {
  return languageCode.split('-')[0].toLowerCase();
}

/**
 * Flatten Whisper's segment/word structure into a word stream.
 * Tokens keep their embedded leading space, so the stream joins by concatenation.
 */
export function parseWhisperOutput(raw: unknown): TimedWord[] {
  const parsed = WhisperOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CollaboratorOutputError('whisper', parsed.error.issues[0]?.message ?? 'invalid output');
  }

  return parsed.data.segments.flatMap((segment) =>
    segment.words
      .filter((word) => word.word.trim().length > 0)
      .map((word) => ({ text: word.word, start: word.start, end: Math.max(word.end, word.start) }))
  );
}

/**
 * Local Whisper model, run synchronously through its CLI with word timestamps.
 */
export class WhisperTranscriber implements ITranscriptionProvider {
  readonly name = 'whisper';
  readonly supportsSpeakerLabels = false;

  constructor(
    private readonly options: WhisperTranscriberOptions,
    private readonly run: CommandRunner = runCommand
  ) {}

  // whisper detects or accepts any ISO 639-1 language
  supportsLanguage(languageCode: string): boolean {
    return /^[a-z]{2,3}(-[A-Z]{2})?$/.test(languageCode);
  }

  async transcribe(context: TranscriptionContext): Promise<TranscriptionOutput> {
    const { wavPath, workDir, artifacts, requestId } = context;
    const outputPath = artifacts.trackFile(
      path.join(workDir, `${path.basename(wavPath, path.extname(wavPath))}.json`)
    );

    logger.info(`[${requestId}] Transcribing with whisper (${this.options.model})`);
    await this.run(
      this.options.command,
      [
        wavPath,
        '--model', this.options.model,
        '--language', toWhisperLanguage(context.languageCode),
        '--word_timestamps', 'True',
        '--output_format', 'json',
        '--output_dir', workDir,
        '--verbose', 'False',
      ],
      { timeoutMs: this.options.timeoutMs }
    );

    let raw: unknown;
    try {
      raw = JSON.parse(await fsp.readFile(outputPath, 'utf8'));
    } catch (err) {
      throw new CollaboratorOutputError(this.name, `cannot read ${outputPath}: ${errorMessage(err)}`);
    }

    const words = parseWhisperOutput(raw);
    logger.info(`[${requestId}] Whisper produced ${words.length} words`);
    return { stream: { words, join: 'concat' } };
  }
}
