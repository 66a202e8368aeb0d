import type { SpeakerTimeline } from '../../types/transcript.types';

/**
 * Speaker-turn detection for one normalized audio file.
 * Implementations must return turns in chronological order.
 */
export interface IDiarizer {
  readonly name: string;
  diarize(wavPath: string): Promise<SpeakerTimeline>;
}
