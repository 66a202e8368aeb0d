import {
  BucketLocationConstraint,
  CreateBucketCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { logger } from '../../config/logger';

const LOCATION_CONSTRAINTS: readonly string[] = Object.values(BucketLocationConstraint);

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return LOCATION_CONSTRAINTS.includes(region);
}

/**
 * Object storage used to hand audio to the remote transcription engine.
 */
export class S3StorageService {
  constructor(
    private readonly s3: S3Client,
    readonly bucket: string,
    private readonly region: string
  ) {}

  toUri(key: string): string {
    return `s3://${this.bucket}/${key}`;
  }

  async putObject(key: string, body: Buffer, contentType: string = 'audio/wav'): Promise<void> {
    await this.s3.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );
    logger.debug(`Uploaded ${this.toUri(key)} (${body.length} bytes)`);
  }

  async deleteObject(key: string): Promise<void> {
    await this.s3.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    logger.debug(`Deleted ${this.toUri(key)}`);
  }

  /**
   * Create the bucket when it does not exist yet. Safe to call repeatedly.
   */
  async ensureBucket(): Promise<void> {
    try {
      await this.s3.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return;
    } catch (err) {
      if (!(err instanceof S3ServiceException) || err.$metadata.httpStatusCode !== 404) {
        throw err;
      }
    }

    logger.info(`Bucket '${this.bucket}' not found. Creating it...`);
    // us-east-1 is the default location and must not be sent as a constraint
    const configuration =
      this.region !== 'us-east-1' && isLocationConstraint(this.region)
        ? { LocationConstraint: this.region }
        : undefined;

    await this.s3.send(
      new CreateBucketCommand({
        Bucket: this.bucket,
        CreateBucketConfiguration: configuration,
      })
    );
    logger.info(`Bucket '${this.bucket}' created successfully`);
  }
}
