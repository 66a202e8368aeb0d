import { z } from 'zod';
import { logger } from '../../config/logger';
import type { SpeakerTimeline } from '../../types/transcript.types';
import { CollaboratorOutputError, errorMessage } from '../../utils/errors';
import { runCommand, type CommandRunner } from '../../utils/run-command';
import type { IDiarizer } from './diarizer.interface';

const TurnSchema = z
  .object({
    start: z.number().nonnegative(),
    end: z.number(),
    speaker: z.string().min(1),
  })
  .refine((turn) => turn.end > turn.start, { message: 'turn end must be after start' });

const TurnsSchema = z.array(TurnSchema);

export interface PyannoteDiarizerOptions {
  /** Executable printing `[{start, end, speaker}]` JSON for a WAV path. */
  command: string;
  model: string;
  huggingFaceToken?: string;
  timeoutMs?: number;
}

/**
 * pyannote speaker diarization, run out of process.
 *
 * The command receives `--model <id> <wav>` and HF_TOKEN in its environment,
 * and prints the turns as JSON on stdout in the order the pipeline emits them.
 */
export class PyannoteDiarizer implements IDiarizer {
  readonly name = 'pyannote';

  constructor(
    private readonly options: PyannoteDiarizerOptions,
    private readonly run: CommandRunner = runCommand
  ) {}

  async diarize(wavPath: string): Promise<SpeakerTimeline> {
    const { stdout } = await this.run(this.options.command, ['--model', this.options.model, wavPath], {
      env: { ...process.env, HF_TOKEN: this.options.huggingFaceToken },
      timeoutMs: this.options.timeoutMs,
    });

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (err) {
      throw new CollaboratorOutputError(this.name, `stdout is not JSON (${errorMessage(err)})`);
    }

    const parsed = TurnsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CollaboratorOutputError(this.name, parsed.error.issues[0]?.message ?? 'invalid turns');
    }

    const speakers = new Set(parsed.data.map((turn) => turn.speaker));
    logger.info(`Diarization found ${parsed.data.length} turns from ${speakers.size} speakers`);
    return parsed.data;
  }
}
