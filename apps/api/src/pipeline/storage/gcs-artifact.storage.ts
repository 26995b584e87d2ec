import { Logger } from '@nestjs/common';
import { Storage } from '@google-cloud/storage';
import { ArtifactStorage, UploadedArtifact } from './artifact-storage';

const SIGNED_URL_TTL_MS = 60 * 60 * 1000;

export class GcsArtifactStorage implements ArtifactStorage {
  readonly provider = 'gcs';
  private readonly logger = new Logger(GcsArtifactStorage.name);
  // Credentials come from GOOGLE_APPLICATION_CREDENTIALS or the runtime's service account.
  private readonly storage = new Storage();

  constructor(
    private readonly bucketName: string,
    private readonly makePublic: boolean,
  ) {}

  async upload(localPath: string, remoteName: string): Promise<UploadedArtifact> {
    const [file] = await this.storage.bucket(this.bucketName).upload(localPath, {
      destination: remoteName,
      metadata: { contentType: 'video/mp4' },
    });
    let url: string;
    if (this.makePublic) {
      await file.makePublic();
      url = file.publicUrl();
    } else {
      [url] = await file.getSignedUrl({
        version: 'v4',
        action: 'read',
        expires: Date.now() + SIGNED_URL_TTL_MS,
      });
    }
    this.logger.log(`Uploaded gs://${this.bucketName}/${remoteName}`);
    return { url, key: remoteName, provider: this.provider };
  }
}
