import { ConfigValidationError, loadConfig, missingRequiredKeys } from './app-config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.version).toBe('1.0.0');
    expect(config.openai.model).toBe('gpt-4o');
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.elevenlabs.defaultVoice).toBe('adam');
    expect(config.storage.provider).toBe('none');
    expect(config.storage.public).toBe(true);
    expect(config.jobs).toEqual({
      store: 'memory',
      outputDir: 'output',
      maxConcurrent: 2,
      queueLimit: 20,
      retentionMs: 3_600_000,
      sweepIntervalMs: 60_000,
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ PORT: '', OPENAI_API_KEY: '', STORAGE_PROVIDER: '' });

    expect(config.port).toBe(5000);
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.storage.provider).toBe('none');
  });

  it('reads numbers and flags from strings', () => {
    const config = loadConfig({
      PORT: '8080',
      STORAGE_PUBLIC: 'false',
      MAX_CONCURRENT_JOBS: '4',
      JOB_QUEUE_LIMIT: '0',
      JOB_RETENTION_MINUTES: '0',
      JOB_SWEEP_INTERVAL_SECONDS: '5',
    });

    expect(config.port).toBe(8080);
    expect(config.storage.public).toBe(false);
    expect(config.jobs.maxConcurrent).toBe(4);
    expect(config.jobs.queueLimit).toBe(0);
    expect(config.jobs.retentionMs).toBe(0);
    expect(config.jobs.sweepIntervalMs).toBe(5000);
  });

  it('rejects values that do not parse', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigValidationError);
    expect(() => loadConfig({ STORAGE_PROVIDER: 'azure' })).toThrow(ConfigValidationError);
    expect(() => loadConfig({ MAX_CONCURRENT_JOBS: '0' })).toThrow(ConfigValidationError);
    expect(() => loadConfig({ SPACES_ENDPOINT: 'nyc3' })).toThrow(ConfigValidationError);
  });

  it('falls back to CLOUD_STORAGE_BUCKET for the bucket name', () => {
    expect(loadConfig({}).storage.bucket).toBe('text-to-video-ai');
    expect(loadConfig({ CLOUD_STORAGE_BUCKET: 'legacy-videos' }).storage.bucket).toBe('legacy-videos');
    expect(
      loadConfig({ CLOUD_STORAGE_BUCKET: 'legacy-videos', STORAGE_BUCKET: 'videos' }).storage.bucket,
    ).toBe('videos');
  });

  it('uses AWS credentials unless a Spaces endpoint is set', () => {
    const env = {
      AWS_ACCESS_KEY_ID: 'aws-id',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      SPACES_ACCESS_KEY_ID: 'spaces-id',
      SPACES_SECRET_ACCESS_KEY: 'test-secret',
    };

    expect(loadConfig(env).storage.s3).toEqual({
      region: 'us-east-1',
      accessKeyId: 'aws-id',
      secretAccessKey: 'test-secret',
    });
    expect(
      loadConfig({ ...env, SPACES_ENDPOINT: 'https://nyc3.digitaloceanspaces.com' }).storage.s3,
    ).toEqual({
      endpoint: 'https://nyc3.digitaloceanspaces.com',
      region: 'nyc3',
      accessKeyId: 'spaces-id',
      secretAccessKey: 'test-secret',
    });
  });
});

describe('missingRequiredKeys', () => {
  it('lists every provider key that is not set', () => {
    expect(missingRequiredKeys(loadConfig({}))).toEqual([
      'OPENAI_API_KEY',
      'ELEVENLABS_API_KEY',
      'PEXELS_API_KEY',
    ]);
  });

  it('asks for Supabase credentials only when Supabase stores the videos', () => {
    const keys = {
      OPENAI_API_KEY: 'test-key',
      ELEVENLABS_API_KEY: 'test-key',
      PEXELS_API_KEY: 'test-key',
    };

    expect(missingRequiredKeys(loadConfig(keys))).toEqual([]);
    expect(missingRequiredKeys(loadConfig({ ...keys, STORAGE_PROVIDER: 'supabase' }))).toEqual([
      'SUPABASE_URL',
      'SUPABASE_SERVICE_ROLE_KEY',
    ]);
  });

  it('asks for the credentials of the S3 service in use', () => {
    const keys = {
      OPENAI_API_KEY: 'test-key',
      ELEVENLABS_API_KEY: 'test-key',
      PEXELS_API_KEY: 'test-key',
      STORAGE_PROVIDER: 's3',
    };

    expect(missingRequiredKeys(loadConfig(keys))).toEqual(['AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY']);
    expect(
      missingRequiredKeys(loadConfig({ ...keys, AWS_ACCESS_KEY_ID: 'aws-id', AWS_SECRET_ACCESS_KEY: 'test-secret' })),
    ).toEqual([]);
    expect(
      missingRequiredKeys(
        loadConfig({
          ...keys,
          SPACES_ENDPOINT: 'https://nyc3.digitaloceanspaces.com',
          SPACES_ACCESS_KEY_ID: 'spaces-id',
        }),
      ),
    ).toEqual(['SPACES_SECRET_ACCESS_KEY']);
  });
});
