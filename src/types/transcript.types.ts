/**
 * Records shared by the alignment engine, the transcription providers and the
 * HTTP layer. All times are in seconds.
 */

/** One speaker turn as emitted by the diarizer. */
export interface TimelineInterval {
  start: number;
  end: number;
  speaker: string;
}

/** Diarizer output for one audio file, in emission order. */
export type SpeakerTimeline = TimelineInterval[];

export interface TimedWord {
  text: string;
  start: number;
  end: number;
}

/**
 * How words of a stream are glued back into text.
 *  - space:  tokens are bare words, join with a single space
 *  - concat: tokens already carry their leading space (Whisper style)
 */
export type TextJoin = 'space' | 'concat';

export interface WordStream {
  words: TimedWord[];
  join: TextJoin;
}

export interface AttributedWord extends TimedWord {
  speaker: string;
}

export interface TranscriptSegment {
  speaker: string;
  text: string;
  start: number;
  end: number;
}

export interface DiarizationResponse {
  transcription: TranscriptSegment[];
}
