import { S3Client } from '@aws-sdk/client-s3';
import { TranscribeClient } from '@aws-sdk/client-transcribe';
import type { Settings } from './settings';

export interface AwsClients {
  s3: S3Client;
  transcribe: TranscribeClient;
}

/**
 * Process-wide AWS clients. Created once at startup and shared read-only by
 * every request.
 */
export function createAwsClients(settings: Settings): AwsClients {
  const config = {
    region: settings.AWS_REGION,
    credentials:
      settings.AWS_ACCESS_KEY_ID && settings.AWS_SECRET_ACCESS_KEY
        ? {
            accessKeyId: settings.AWS_ACCESS_KEY_ID,
            secretAccessKey: settings.AWS_SECRET_ACCESS_KEY,
          }
        : undefined,
  };

  return {
    s3: new S3Client(config),
    transcribe: new TranscribeClient(config),
  };
}
