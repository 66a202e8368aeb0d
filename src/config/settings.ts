import { z } from 'zod';

/** Speaker ceiling range accepted by AWS Transcribe. */
export const SPEAKER_LABELS_MIN = 2;
export const SPEAKER_LABELS_MAX = 30;

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const SettingsSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: numberFromEnv(8000),
    FRONTEND_URL: z.string().default('*'),
    TEMP_DIR: z.string().min(1).default('temp'),
    MAX_FILE_SIZE: numberFromEnv(200 * 1024 * 1024),

    TRANSCRIPTION_PROVIDER: z.enum(['aws', 'whisper']).default('aws'),
    SPEAKER_SOURCE: z.enum(['local', 'provider']).default('local'),
    LANGUAGE_CODE: z.string().default('ja-JP'),
    MAX_SPEAKER_LABELS: z.coerce.number().int().min(SPEAKER_LABELS_MIN).max(SPEAKER_LABELS_MAX).default(10),

    AWS_REGION: z.string().default('ap-northeast-1'),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    S3_BUCKET_NAME: z.string().optional(),
    TRANSCRIBE_POLL_INTERVAL_MS: numberFromEnv(5_000),
    TRANSCRIBE_JOB_TIMEOUT_MS: numberFromEnv(600_000),

    HUGGING_FACE_TOKEN: z.string().optional(),
    DIARIZATION_COMMAND: z.string().min(1).default('scripts/pyannote-diarize.py'),
    DIARIZATION_MODEL: z.string().min(1).default('pyannote/speaker-diarization-3.1'),

    WHISPER_COMMAND: z.string().min(1).default('whisper'),
    WHISPER_MODEL: z.string().min(1).default('large-v3'),
  })
  .superRefine((env, ctx) => {
    if (env.TRANSCRIPTION_PROVIDER === 'aws') {
      for (const key of ['AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY', 'S3_BUCKET_NAME'] as const) {
        if (!env[key]) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `${key} is required when TRANSCRIPTION_PROVIDER=aws` });
        }
      }
    }
    if (env.SPEAKER_SOURCE === 'provider' && env.TRANSCRIPTION_PROVIDER !== 'aws') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SPEAKER_SOURCE'],
        message: 'SPEAKER_SOURCE=provider needs a transcription provider that labels speakers (aws)',
      });
    }
    if (env.SPEAKER_SOURCE === 'local' && !env.HUGGING_FACE_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HUGGING_FACE_TOKEN'],
        message: 'HUGGING_FACE_TOKEN is required to load the diarization model',
      });
    }
  });

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Parse and validate settings from an environment map.
 * Throws with every offending variable listed.
 */
export function parseSettings(env: NodeJS.ProcessEnv): Settings {
  const result = SettingsSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}

let cached: Settings | undefined;

export function getSettings(): Settings {
  if (!cached) {
    cached = parseSettings(process.env);
  }
  return cached;
}
