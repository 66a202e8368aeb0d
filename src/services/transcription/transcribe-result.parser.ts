import { z } from 'zod';
import type { TimedWord, WordStream } from '../../types/transcript.types';
import { CollaboratorOutputError } from '../../utils/errors';

const TranscribeItemSchema = z.object({
  type: z.string(),
  start_time: z.string().optional(),
  end_time: z.string().optional(),
  speaker_label: z.string().optional(),
  alternatives: z.array(z.object({ content: z.string() })).min(1),
});

const SpeakerLabelsSchema = z.object({
  segments: z.array(
    z.object({
      speaker_label: z.string().optional(),
      items: z
        .array(
          z.object({
            start_time: z.string(),
            end_time: z.string(),
            speaker_label: z.string(),
          })
        )
        .default([]),
    })
  ),
});

export const TranscribeResultSchema = z.object({
  results: z.object({
    items: z.array(TranscribeItemSchema),
    speaker_labels: SpeakerLabelsSchema.optional(),
  }),
});

export type TranscribeResult = z.infer<typeof TranscribeResultSchema>;

export interface ParsedTranscribeResult {
  stream: WordStream;
  /** Provider speaker tag per word, same indices as stream.words. */
  providerLabels: (string | undefined)[];
}

function toSeconds(value: string | undefined, field: string, index: number): number {
  const seconds = value === undefined ? NaN : parseFloat(value);
  if (!Number.isFinite(seconds)) {
    throw new CollaboratorOutputError('AWS Transcribe', `item ${index} has invalid ${field}: ${value}`);
  }
  return seconds;
}

/**
 * Turn the transcript JSON of a completed job into a word stream.
 * Only pronunciation items are kept; punctuation carries no timing.
 */
export function parseTranscribeResult(raw: unknown): ParsedTranscribeResult {
  const parsed = TranscribeResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CollaboratorOutputError('AWS Transcribe', parsed.error.issues[0]?.message ?? 'invalid result');
  }

  const { items, speaker_labels: speakerLabels } = parsed.data.results;

  // Older result files only carry labels in results.speaker_labels
  const labelsByTiming = new Map<string, string>();
  for (const segment of speakerLabels?.segments ?? []) {
    for (const item of segment.items) {
      labelsByTiming.set(`${item.start_time}|${item.end_time}`, item.speaker_label);
    }
  }

  const words: TimedWord[] = [];
  const providerLabels: (string | undefined)[] = [];

  items.forEach((item, index) => {
    if (item.type !== 'pronunciation') return;

    const text = item.alternatives[0].content;
    if (!text) return;

    words.push({
      text,
      start: toSeconds(item.start_time, 'start_time', index),
      end: toSeconds(item.end_time, 'end_time', index),
    });
    providerLabels.push(item.speaker_label ?? labelsByTiming.get(`${item.start_time}|${item.end_time}`));
  });

  return { stream: { words, join: 'space' }, providerLabels };
}
