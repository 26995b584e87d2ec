import { Inject, Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import FormData from 'form-data';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { z } from 'zod';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { TimedWord } from './captions';

const transcriptionSchema = z.object({
  words: z
    .array(z.object({ word: z.string(), start: z.number(), end: z.number() }))
    .optional()
    .default([]),
});

/**
 * Word-level timestamps for a narration track, from the OpenAI
 * transcription endpoint.
 */
@Injectable()
export class NarrationTranscriber {
  private readonly logger = new Logger(NarrationTranscriber.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async wordTimings(audioPath: string, signal?: AbortSignal): Promise<TimedWord[]> {
    const { apiKey, baseUrl, transcriptionModel } = this.config.openai;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY environment variable is required');
    }

    const form = new FormData();
    form.append('file', await readFile(audioPath), {
      filename: basename(audioPath),
      contentType: 'audio/mpeg',
    });
    form.append('model', transcriptionModel);
    form.append('response_format', 'verbose_json');
    form.append('timestamp_granularities[]', 'word');

    const { data } = await axios.post<unknown>(`${baseUrl}/audio/transcriptions`, form, {
      headers: { ...form.getHeaders(), Authorization: `Bearer ${apiKey}` },
      maxBodyLength: Infinity,
      timeout: 120_000,
      signal,
    });
    const parsed = transcriptionSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('Transcription response did not include word timings');
    }
    this.logger.debug(`Transcribed ${parsed.data.words.length} words`);
    return parsed.data.words;
  }
}
