import axios from 'axios';
import FormData from 'form-data';
import { rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tempDir } from '../../../test/helpers';
import { loadConfig } from '../../config/app-config';
import { NarrationTranscriber } from './transcription.service';

describe('NarrationTranscriber', () => {
  const config = loadConfig({ OPENAI_API_KEY: 'test-key' });
  let dir: string;
  let audioPath: string;

  beforeEach(async () => {
    dir = await tempDir();
    audioPath = join(dir, 'narration.mp3');
    await writeFile(audioPath, 'mp3');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('uploads the narration and returns its word timings', async () => {
    const post = jest.spyOn(axios, 'post').mockResolvedValue({
      data: {
        text: 'Dolphins sleep.',
        words: [
          { word: 'Dolphins', start: 0, end: 0.5 },
          { word: 'sleep', start: 0.5, end: 0.9 },
        ],
      },
    });

    const words = await new NarrationTranscriber(config).wordTimings(audioPath);

    expect(words).toEqual([
      { word: 'Dolphins', start: 0, end: 0.5 },
      { word: 'sleep', start: 0.5, end: 0.9 },
    ]);
    expect(post).toHaveBeenCalledWith(
      'https://api.openai.com/v1/audio/transcriptions',
      expect.any(FormData),
      expect.objectContaining({
        headers: expect.objectContaining({
          Authorization: 'Bearer test-key',
          'content-type': expect.stringMatching(/^multipart\/form-data; boundary=/),
        }),
      }),
    );
    const form: unknown = post.mock.calls[0]?.[1];
    if (!(form instanceof FormData)) throw new Error('expected a multipart body');
    const body = form.getBuffer().toString();
    expect(body).toContain('name="file"; filename="narration.mp3"');
    expect(body).toContain('name="model"\r\n\r\nwhisper-1\r\n');
    expect(body).toContain('name="response_format"\r\n\r\nverbose_json\r\n');
    expect(body).toContain('name="timestamp_granularities[]"\r\n\r\nword\r\n');
  });

  it('returns no words when the response carries none', async () => {
    jest.spyOn(axios, 'post').mockResolvedValue({ data: { text: 'Dolphins sleep.' } });

    expect(await new NarrationTranscriber(config).wordTimings(audioPath)).toEqual([]);
  });

  it('rejects a malformed response', async () => {
    jest.spyOn(axios, 'post').mockResolvedValue({ data: { words: [{ word: 'Dolphins' }] } });

    await expect(new NarrationTranscriber(config).wordTimings(audioPath)).rejects.toThrow(
      'Transcription response did not include word timings',
    );
  });

  it('needs an OpenAI key', async () => {
    const post = jest.spyOn(axios, 'post');

    await expect(new NarrationTranscriber(loadConfig({})).wordTimings(audioPath)).rejects.toThrow(
      'OPENAI_API_KEY environment variable is required',
    );
    expect(post).not.toHaveBeenCalled();
  });
});
