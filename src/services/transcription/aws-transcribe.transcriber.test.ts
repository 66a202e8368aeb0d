import fsp from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobStatus } from '../../types/job.types';
import type { SubmitJobRequest } from '../../types/job.types';
import { JobExecutionError } from '../../utils/errors';
import { RequestArtifacts } from '../artifacts';
import type { JobRunResult } from '../jobs/job-orchestrator';
import { AwsTranscribeTranscriber } from './aws-transcribe.transcriber';
import type { TranscriptionContext } from './transcription-provider.interface';

const payload = {
  results: {
    items: [
      {
        type: 'pronunciation',
        start_time: '0.1',
        end_time: '0.4',
        speaker_label: 'spk_0',
        alternatives: [{ content: 'ok' }],
      },
      { type: 'punctuation', alternatives: [{ content: '.' }] },
    ],
  },
};

function fakeStorage() {
  return {
    toUri: (key: string) => `s3://test-bucket/${key}`,
    putObject: vi.fn(async (_key: string, _body: Buffer, _contentType?: string): Promise<void> => undefined),
    deleteObject: vi.fn(async (_key: string): Promise<void> => undefined),
  };
}

function fakeOrchestrator(result: () => Promise<JobRunResult>) {
  return { run: vi.fn(async (_request: SubmitJobRequest): Promise<JobRunResult> => result()) };
}

const completed = async (): Promise<JobRunResult> => ({
  record: { jobName: 'diarization-req-1', status: JobStatus.COMPLETED },
  payload,
});

describe('AwsTranscribeTranscriber', () => {
  let dir: string;
  let artifacts: RequestArtifacts;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'aws-transcriber-test-'));
    await fsp.writeFile(path.join(dir, 'req-1.wav'), 'RIFF-audio');
    artifacts = new RequestArtifacts('req-1');
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  function contextFor(withSpeakerLabels: boolean): TranscriptionContext {
    return {
      requestId: 'req-1',
      wavPath: path.join(dir, 'req-1.wav'),
      workDir: dir,
      artifacts,
      languageCode: 'ja-JP',
      withSpeakerLabels,
      maxSpeakers: 4,
    };
  }

  it('supports exactly the AWS Transcribe language codes', () => {
    const transcriber = new AwsTranscribeTranscriber(fakeStorage(), fakeOrchestrator(completed));

    expect(transcriber.supportsLanguage('ja-JP')).toBe(true);
    expect(transcriber.supportsLanguage('xx-XX')).toBe(false);
  });

  it('uploads the WAV and submits a job named after the request', async () => {
    const storage = fakeStorage();
    const orchestrator = fakeOrchestrator(completed);
    const transcriber = new AwsTranscribeTranscriber(storage, orchestrator);

    const output = await transcriber.transcribe(contextFor(false));

    expect(storage.putObject).toHaveBeenCalledWith('uploads/req-1.wav', Buffer.from('RIFF-audio'));
    expect(orchestrator.run).toHaveBeenCalledWith({
      jobName: 'diarization-req-1',
      languageCode: 'ja-JP',
      mediaUri: 's3://test-bucket/uploads/req-1.wav',
      showSpeakerLabels: false,
      maxSpeakerLabels: undefined,
    });
    expect(output).toEqual({ stream: { words: [{ text: 'ok', start: 0.1, end: 0.4 }], join: 'space' } });
  });

  it('asks for speaker labels and returns the provider tags', async () => {
    const storage = fakeStorage();
    const orchestrator = fakeOrchestrator(completed);
    const transcriber = new AwsTranscribeTranscriber(storage, orchestrator);

    const output = await transcriber.transcribe(contextFor(true));

    expect(orchestrator.run).toHaveBeenCalledWith(
      expect.objectContaining({ showSpeakerLabels: true, maxSpeakerLabels: 4 })
    );
    expect(output.providerLabels).toEqual(['spk_0']);
  });

  it('registers the uploaded object for removal even when the job fails', async () => {
    const storage = fakeStorage();
    const orchestrator = fakeOrchestrator(async () => {
      throw new JobExecutionError('diarization-req-1', 'Bad audio');
    });
    const transcriber = new AwsTranscribeTranscriber(storage, orchestrator);

    await expect(transcriber.transcribe(contextFor(false))).rejects.toBeInstanceOf(JobExecutionError);

    expect(artifacts.count).toBe(1);
    await artifacts.cleanup();
    expect(storage.deleteObject).toHaveBeenCalledWith('uploads/req-1.wav');
  });

  it('registers the object before the upload starts', async () => {
    const storage = fakeStorage();
    storage.putObject.mockRejectedValueOnce(new Error('connection reset'));
    const orchestrator = fakeOrchestrator(completed);
    const transcriber = new AwsTranscribeTranscriber(storage, orchestrator);

    await expect(transcriber.transcribe(contextFor(false))).rejects.toThrow('connection reset');

    expect(orchestrator.run).not.toHaveBeenCalled();
    expect(artifacts.count).toBe(1);
  });
});
