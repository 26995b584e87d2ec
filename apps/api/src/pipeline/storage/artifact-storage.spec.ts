import { loadConfig } from '../../config/app-config';
import { createArtifactStorage, remoteVideoName } from './artifact-storage';
import { GcsArtifactStorage } from './gcs-artifact.storage';
import { S3ArtifactStorage } from './s3-artifact.storage';
import { SupabaseArtifactStorage } from './supabase-artifact.storage';

describe('remoteVideoName', () => {
  it('prefixes the job id with a UTC timestamp', () => {
    expect(remoteVideoName('abc', new Date('2026-10-18T09:05:03.123Z'))).toBe(
      'videos/20261018_090503_video_abc.mp4',
    );
  });
});

describe('createArtifactStorage', () => {
  it('keeps videos local by default', () => {
    expect(createArtifactStorage(loadConfig({}))).toBeNull();
  });

  it('builds a Cloud Storage uploader', () => {
    const storage = createArtifactStorage(loadConfig({ STORAGE_PROVIDER: 'gcs' }));

    expect(storage).toBeInstanceOf(GcsArtifactStorage);
    expect(storage?.provider).toBe('gcs');
  });

  it('builds a Supabase uploader that needs credentials only when used', async () => {
    const storage = createArtifactStorage(loadConfig({ STORAGE_PROVIDER: 'supabase' }));

    expect(storage).toBeInstanceOf(SupabaseArtifactStorage);
    await expect(storage?.upload('/tmp/missing.mp4', 'videos/x.mp4')).rejects.toThrow(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for Supabase storage',
    );
  });

  it('builds an S3 uploader for the configured bucket', () => {
    const storage = createArtifactStorage(
      loadConfig({ STORAGE_PROVIDER: 's3', CLOUD_STORAGE_BUCKET: 'videos', AWS_REGION: 'eu-west-1' }),
    );

    expect(storage).toBeInstanceOf(S3ArtifactStorage);
    expect(storage?.provider).toBe('s3');
  });
});
