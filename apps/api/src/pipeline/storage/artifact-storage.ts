import { AppConfig, StorageProvider } from '../../config/app-config';
import { GcsArtifactStorage } from './gcs-artifact.storage';
import { S3ArtifactStorage } from './s3-artifact.storage';
import { SupabaseArtifactStorage } from './supabase-artifact.storage';

export const ARTIFACT_STORAGE = Symbol('ARTIFACT_STORAGE');

export interface UploadedArtifact {
  url: string;
  key: string;
  provider: Exclude<StorageProvider, 'none'>;
}

export interface ArtifactStorage {
  readonly provider: Exclude<StorageProvider, 'none'>;
  upload(localPath: string, remoteName: string): Promise<UploadedArtifact>;
}

export function remoteVideoName(jobId: string, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `videos/${stamp}_video_${jobId}.mp4`;
}

/** Null when finished videos stay on local disk. */
export function createArtifactStorage(config: AppConfig): ArtifactStorage | null {
  const { provider, bucket, public: isPublic, supabaseUrl, supabaseServiceRoleKey, s3 } = config.storage;
  switch (provider) {
    case 'none':
      return null;
    case 'gcs':
      return new GcsArtifactStorage(bucket, isPublic);
    case 'supabase':
      return new SupabaseArtifactStorage(bucket, isPublic, supabaseUrl, supabaseServiceRoleKey);
    case 's3':
      return new S3ArtifactStorage(bucket, isPublic, s3);
  }
}
