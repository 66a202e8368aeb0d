/**
 * Fuse diarization turns with transcribed words into speaker-grouped segments.
 *
 * Attribution is strict containment: a word belongs to the first turn that
 * fully covers it, otherwise to UNKNOWN_SPEAKER. Consecutive words of the same
 * speaker are merged while the silence between them stays under
 * SPEECH_MERGE_THRESHOLD_S.
 */

import type {
  AttributedWord,
  SpeakerTimeline,
  TextJoin,
  TimedWord,
  TranscriptSegment,
  WordStream,
} from '../types/transcript.types';

export const UNKNOWN_SPEAKER = 'UNKNOWN';

/** Maximum gap (seconds) between two words of one continuous utterance. */
export const SPEECH_MERGE_THRESHOLD_S = 0.5;

/**
 * Speaker of the first interval that fully contains the word.
 * Timeline order is trusted as emitted; overlapping or unordered turns are
 * not repaired.
 */
export function findSpeaker(timeline: SpeakerTimeline, word: TimedWord): string {
  for (const interval of timeline) {
    if (interval.start <= word.start && word.end <= interval.end) {
      return interval.speaker;
    }
  }
  return UNKNOWN_SPEAKER;
}

export function attributeWords(timeline: SpeakerTimeline, words: TimedWord[]): AttributedWord[] {
  return words.map((word) => ({ ...word, speaker: findSpeaker(timeline, word) }));
}

function joinText(current: string, next: string, join: TextJoin): string {
  return join === 'space' ? `${current} ${next}` : current + next;
}

function seal(segment: TranscriptSegment, join: TextJoin): TranscriptSegment {
  // concat tokens carry their own leading space
  const text = join === 'concat' ? segment.text.trim() : segment.text;
  return Object.freeze({ ...segment, text });
}

/**
 * Merge attributed words into segments.
 * A new segment starts on any speaker change or when the gap to the
 * previous word reaches the merge threshold.
 */
export function mergeWords(words: AttributedWord[], join: TextJoin): TranscriptSegment[] {
  if (words.length === 0) return [];

  const segments: TranscriptSegment[] = [];
  const [first, ...rest] = words;
  let current: TranscriptSegment = {
    speaker: first.speaker,
    text: first.text,
    start: first.start,
    end: first.end,
  };

  for (const word of rest) {
    if (word.speaker === current.speaker && word.start - current.end < SPEECH_MERGE_THRESHOLD_S) {
      current.text = joinText(current.text, word.text, join);
      current.end = word.end;
    } else {
      segments.push(seal(current, join));
      current = { speaker: word.speaker, text: word.text, start: word.start, end: word.end };
    }
  }

  segments.push(seal(current, join));
  return segments;
}

export function align(timeline: SpeakerTimeline, stream: WordStream): TranscriptSegment[] {
  return mergeWords(attributeWords(timeline, stream.words), stream.join);
}

/**
 * Attribute words from provider speaker tags instead of a local timeline.
 * `labels[i]` is the provider tag of `words[i]`; untagged words are UNKNOWN.
 */
export function attributeByProviderLabels(
  words: TimedWord[],
  labels: ReadonlyArray<string | undefined>,
  resolve: (providerLabel: string) => string
): AttributedWord[] {
  return words.map((word, i) => {
    const label = labels[i];
    return { ...word, speaker: label ? resolve(label) : UNKNOWN_SPEAKER };
  });
}
