import { promises as fs } from 'fs';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { log } from '../log';

export interface ObjectStorage {
  upload(localPath: string, key: string, contentType: string): Promise<void>;
  presignedUrl(key: string, ttlSeconds: number): Promise<string>;
  publicUrl(key: string): string;
}

export interface S3StorageOptions {
  bucket: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export class S3ObjectStorage implements ObjectStorage {
  private readonly client: S3Client;

  constructor(private readonly options: S3StorageOptions) {
    // Falls back to the default credential chain when no static keys are set.
    const credentials =
      options.accessKeyId && options.secretAccessKey
        ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
        : undefined;
    this.client = new S3Client({ region: options.region, credentials });
  }

  public async upload(localPath: string, key: string, contentType: string): Promise<void> {
    const body = await fs.readFile(localPath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }),
    );
    log.info(
      { event: 's3_upload_complete', bucket: this.options.bucket, key, bytes: body.length },
      'uploaded object',
    );
  }

  public presignedUrl(key: string, ttlSeconds: number): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.options.bucket, Key: key }), {
      expiresIn: ttlSeconds,
    });
  }

  public publicUrl(key: string): string {
    return `https://${this.options.bucket}.s3.${this.options.region}.amazonaws.com/${key}`;
  }
}
