import { describe, expect, it } from 'vitest';
import { CollaboratorOutputError } from '../../utils/errors';
import { parseTranscribeResult } from './transcribe-result.parser';

describe('parseTranscribeResult', () => {
  it('keeps pronunciation items with their timing', () => {
    const { stream, providerLabels } = parseTranscribeResult({
      jobName: 'diarization-req-1',
      results: {
        transcripts: [{ transcript: 'Good morning, team.' }],
        items: [
          { type: 'pronunciation', start_time: '0.04', end_time: '0.5', alternatives: [{ content: 'Good' }] },
          { type: 'pronunciation', start_time: '0.5', end_time: '0.98', alternatives: [{ content: 'morning' }] },
          { type: 'punctuation', alternatives: [{ content: ',' }] },
          { type: 'pronunciation', start_time: '1.1', end_time: '1.4', alternatives: [{ content: 'team' }] },
          { type: 'punctuation', alternatives: [{ content: '.' }] },
        ],
      },
    });

    expect(stream).toEqual({
      join: 'space',
      words: [
        { text: 'Good', start: 0.04, end: 0.5 },
        { text: 'morning', start: 0.5, end: 0.98 },
        { text: 'team', start: 1.1, end: 1.4 },
      ],
    });
    expect(providerLabels).toEqual([undefined, undefined, undefined]);
  });

  it('reads speaker tags from items or from speaker_labels segments', () => {
    const { stream, providerLabels } = parseTranscribeResult({
      results: {
        items: [
          {
            type: 'pronunciation',
            start_time: '0.0',
            end_time: '0.3',
            speaker_label: 'spk_1',
            alternatives: [{ content: 'yes' }],
          },
          { type: 'pronunciation', start_time: '0.9', end_time: '1.2', alternatives: [{ content: 'no' }] },
          { type: 'pronunciation', start_time: '2.0', end_time: '2.2', alternatives: [{ content: 'maybe' }] },
        ],
        speaker_labels: {
          speakers: 2,
          segments: [
            {
              speaker_label: 'spk_0',
              start_time: '0.9',
              end_time: '1.2',
              items: [{ start_time: '0.9', end_time: '1.2', speaker_label: 'spk_0' }],
            },
          ],
        },
      },
    });

    expect(stream.words.map((word) => word.text)).toEqual(['yes', 'no', 'maybe']);
    expect(providerLabels).toEqual(['spk_1', 'spk_0', undefined]);
  });

  it('returns an empty stream for a silent recording', () => {
    expect(parseTranscribeResult({ results: { items: [] } })).toEqual({
      stream: { words: [], join: 'space' },
      providerLabels: [],
    });
  });

  it('rejects a payload without results', () => {
    expect(() => parseTranscribeResult({ status: 'done' })).toThrow(CollaboratorOutputError);
  });

  it('rejects a pronunciation item without timing', () => {
    expect(() =>
      parseTranscribeResult({
        results: { items: [{ type: 'pronunciation', alternatives: [{ content: 'hi' }] }] },
      })
    ).toThrow('AWS Transcribe returned malformed output: item 0 has invalid start_time: undefined');
  });
});
