import { describe, expect, it, vi } from 'vitest';
import { JobStatus } from '../../types/job.types';
import type { JobStatusSnapshot, RemoteJobClient, SubmitJobRequest } from '../../types/job.types';
import { JobExecutionError, JobTimeoutError } from '../../utils/errors';
import { parseTranscribeResult } from '../transcription/transcribe-result.parser';
import { DEFAULT_POLL_POLICY, JobOrchestrator } from './job-orchestrator';
import type { Clock } from './job-orchestrator';

const request: SubmitJobRequest = {
  jobName: 'diarization-req-1',
  languageCode: 'ja-JP',
  mediaUri: 's3://test-bucket/uploads/req-1.wav',
  showSpeakerLabels: false,
};

const RESULT_URI = 'https://transcripts.example.test/diarization-req-1.json';

const transcript = {
  results: {
    items: [
      { type: 'pronunciation', start_time: '0.0', end_time: '0.4', alternatives: [{ content: 'hello' }] },
      { type: 'punctuation', alternatives: [{ content: '.' }] },
    ],
  },
};

/** Fake remote backend answering status polls from a script. */
function scriptedClient(statuses: JobStatusSnapshot[], payload: unknown = transcript) {
  const script = [...statuses];
  const client = {
    submit: vi.fn(async (_request: SubmitJobRequest): Promise<void> => undefined),
    getStatus: vi.fn(
      async (_jobName: string): Promise<JobStatusSnapshot> => script.shift() ?? { status: JobStatus.IN_PROGRESS }
    ),
    fetchResult: vi.fn(async (_resultUri: string): Promise<unknown> => payload),
  } satisfies RemoteJobClient;
  return client;
}

/** Clock that only moves when the orchestrator sleeps. */
function fakeTime() {
  let now = 0;
  const clock: Clock = { now: () => now };
  const sleep = vi.fn(async (ms: number): Promise<void> => {
    now += ms;
  });
  return { clock, sleep };
}

describe('JobOrchestrator', () => {
  it('polls until completion and returns the fetched transcript', async () => {
    const client = scriptedClient([
      { status: JobStatus.IN_PROGRESS },
      { status: JobStatus.IN_PROGRESS },
      { status: JobStatus.COMPLETED, resultUri: RESULT_URI },
    ]);
    const { clock, sleep } = fakeTime();
    const orchestrator = new JobOrchestrator(client, DEFAULT_POLL_POLICY, clock, sleep);

    const { record, payload } = await orchestrator.run(request);

    expect(client.submit).toHaveBeenCalledWith(request);
    expect(client.getStatus).toHaveBeenCalledTimes(3);
    expect(client.getStatus).toHaveBeenCalledWith('diarization-req-1');
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(5_000);
    expect(client.fetchResult).toHaveBeenCalledWith(RESULT_URI);
    expect(record).toEqual({
      jobName: 'diarization-req-1',
      status: JobStatus.COMPLETED,
      resultUri: RESULT_URI,
      failureReason: undefined,
    });
    expect(parseTranscribeResult(payload).stream).toEqual({
      words: [{ text: 'hello', start: 0, end: 0.4 }],
      join: 'space',
    });
  });

  it('rejects with the provider failure reason', async () => {
    const client = scriptedClient([
      { status: JobStatus.IN_PROGRESS },
      { status: JobStatus.FAILED, failureReason: 'Bad audio' },
    ]);
    const { clock, sleep } = fakeTime();
    const orchestrator = new JobOrchestrator(client, DEFAULT_POLL_POLICY, clock, sleep);

    const error = await orchestrator.run(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(JobExecutionError);
    expect(error).toMatchObject({
      jobName: 'diarization-req-1',
      reason: 'Bad audio',
      message: 'Transcription job failed with reason: Bad audio',
    });
    expect(client.fetchResult).not.toHaveBeenCalled();
  });

  it('reports Unknown when the provider gives no failure reason', async () => {
    const client = scriptedClient([{ status: JobStatus.FAILED }]);
    const { clock, sleep } = fakeTime();
    const orchestrator = new JobOrchestrator(client, DEFAULT_POLL_POLICY, clock, sleep);

    await expect(orchestrator.run(request)).rejects.toMatchObject({ reason: 'Unknown' });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('times out when the job never reaches a terminal state', async () => {
    const client = scriptedClient([]);
    const { clock, sleep } = fakeTime();
    const orchestrator = new JobOrchestrator(client, DEFAULT_POLL_POLICY, clock, sleep);

    const error = await orchestrator.run(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(JobTimeoutError);
    expect(error).toMatchObject({
      jobName: 'diarization-req-1',
      timeoutMs: 600_000,
      message: 'Transcription job diarization-req-1 timed out after 600s',
    });
    // polls at t = 0, 5s, ..., 595s
    expect(client.getStatus).toHaveBeenCalledTimes(120);
    expect(client.fetchResult).not.toHaveBeenCalled();
  });

  it('honours a custom poll policy', async () => {
    const client = scriptedClient([]);
    const { clock, sleep } = fakeTime();
    const orchestrator = new JobOrchestrator(client, { pollIntervalMs: 1_000, timeoutMs: 3_000 }, clock, sleep);

    await expect(orchestrator.run(request)).rejects.toBeInstanceOf(JobTimeoutError);
    expect(client.getStatus).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(1_000);
  });

  it('rejects a completed job without a transcript location', async () => {
    const client = scriptedClient([{ status: JobStatus.COMPLETED }]);
    const { clock, sleep } = fakeTime();
    const orchestrator = new JobOrchestrator(client, DEFAULT_POLL_POLICY, clock, sleep);

    await expect(orchestrator.run(request)).rejects.toMatchObject({ reason: 'Missing transcript location' });
    expect(client.fetchResult).not.toHaveBeenCalled();
  });

  it('propagates a submission failure without polling', async () => {
    const client = scriptedClient([]);
    client.submit.mockRejectedValueOnce(new Error('ConflictException: job name in use'));
    const { clock, sleep } = fakeTime();
    const orchestrator = new JobOrchestrator(client, DEFAULT_POLL_POLICY, clock, sleep);

    await expect(orchestrator.run(request)).rejects.toThrow('ConflictException: job name in use');
    expect(client.getStatus).not.toHaveBeenCalled();
  });
});
