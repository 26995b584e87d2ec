import { Logger } from '@nestjs/common';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { readFile } from 'fs/promises';
import { S3Config } from '../../config/app-config';
import { ArtifactStorage, UploadedArtifact } from './artifact-storage';

const SIGNED_URL_TTL_SECONDS = 60 * 60;

/** AWS S3, or DigitalOcean Spaces when an endpoint is configured. */
export class S3ArtifactStorage implements ArtifactStorage {
  readonly provider = 's3';
  private readonly logger = new Logger(S3ArtifactStorage.name);
  private client: S3Client | null = null;

  constructor(
    private readonly bucket: string,
    private readonly makePublic: boolean,
    private readonly s3: S3Config,
  ) {}

  async upload(localPath: string, remoteName: string): Promise<UploadedArtifact> {
    const client = this.getClient();
    await client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: remoteName,
        Body: await readFile(localPath),
        ContentType: 'video/mp4',
        ACL: this.makePublic ? 'public-read' : undefined,
      }),
    );

    const url = this.makePublic
      ? this.publicUrl(remoteName)
      : await getSignedUrl(client, new GetObjectCommand({ Bucket: this.bucket, Key: remoteName }), {
          expiresIn: SIGNED_URL_TTL_SECONDS,
        });
    this.logger.log(`Uploaded s3://${this.bucket}/${remoteName}`);
    return { url, key: remoteName, provider: this.provider };
  }

  publicUrl(key: string): string {
    if (this.s3.endpoint) {
      return `${this.s3.endpoint.replace(/\/+$/, '')}/${this.bucket}/${key}`;
    }
    return `https://${this.bucket}.s3.${this.s3.region}.amazonaws.com/${key}`;
  }

  private getClient(): S3Client {
    const { endpoint, region, accessKeyId, secretAccessKey } = this.s3;
    if (!accessKeyId || !secretAccessKey) {
      const prefix = endpoint ? 'SPACES' : 'AWS';
      throw new Error(`${prefix}_ACCESS_KEY_ID and ${prefix}_SECRET_ACCESS_KEY are required for S3 storage`);
    }
    this.client ??= new S3Client({ region, endpoint, credentials: { accessKeyId, secretAccessKey } });
    return this.client;
  }
}
