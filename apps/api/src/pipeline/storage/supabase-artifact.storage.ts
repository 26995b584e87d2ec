import { Logger } from '@nestjs/common';
import { SupabaseClient, createClient } from '@supabase/supabase-js';
import { readFile } from 'fs/promises';
import { ArtifactStorage, UploadedArtifact } from './artifact-storage';

const SIGNED_URL_TTL_SECONDS = 60 * 60;

export class SupabaseArtifactStorage implements ArtifactStorage {
  readonly provider = 'supabase';
  private readonly logger = new Logger(SupabaseArtifactStorage.name);
  private client: SupabaseClient | null = null;

  constructor(
    private readonly bucket: string,
    private readonly makePublic: boolean,
    private readonly url?: string,
    private readonly serviceRoleKey?: string,
  ) {}

  async upload(localPath: string, remoteName: string): Promise<UploadedArtifact> {
    const bucket = this.getClient().storage.from(this.bucket);
    const { error: uploadError } = await bucket.upload(remoteName, await readFile(localPath), {
      contentType: 'video/mp4',
      upsert: true,
    });
    if (uploadError) {
      throw new Error(uploadError.message || 'Failed to upload video to Supabase Storage');
    }

    let url: string;
    if (this.makePublic) {
      url = bucket.getPublicUrl(remoteName).data.publicUrl;
    } else {
      const { data, error } = await bucket.createSignedUrl(remoteName, SIGNED_URL_TTL_SECONDS);
      if (error || !data) {
        throw new Error(error?.message ?? 'Failed to sign Supabase Storage URL');
      }
      url = data.signedUrl;
    }
    this.logger.log(`Uploaded ${this.bucket}/${remoteName}`);
    return { url, key: remoteName, provider: this.provider };
  }

  private getClient(): SupabaseClient {
    if (!this.url || !this.serviceRoleKey) {
      throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for Supabase storage');
    }
    this.client ??= createClient(this.url, this.serviceRoleKey, { auth: { persistSession: false } });
    return this.client;
  }
}
