import ffmpeg from 'fluent-ffmpeg';
import { logger } from '../../config/logger';
import { errorMessage } from '../../utils/errors';

/** Sample rate expected by both the diarization model and Whisper. */
export const CANONICAL_SAMPLE_RATE = 16000;

// The "contract" for anything turning an upload into the canonical waveform
export interface IAudioNormalizer {
  convertToWav(inputPath: string, outputPath: string): Promise<string>;
}

class FFmpegService implements IAudioNormalizer {
  /**
   * Convert any container ffmpeg can read into mono 16 kHz PCM WAV.
   * Video streams are dropped.
   */
  async convertToWav(inputPath: string, outputPath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const command = ffmpeg(inputPath)
        .noVideo()
        .audioCodec('pcm_s16le')
        .audioChannels(1)
        .audioFrequency(CANONICAL_SAMPLE_RATE)
        .format('wav')
        .output(outputPath);

      command
        .on('end', () => {
          logger.debug(`Audio normalized: ${outputPath}`);
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = errorMessage(err);
          logger.error('FFmpeg conversion error: %s', msg);
          reject(new Error(`FFmpeg conversion failed: ${msg}`));
        });

      command.run();
    });
  }
}

export default new FFmpegService();
