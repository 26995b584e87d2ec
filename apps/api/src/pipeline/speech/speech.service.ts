import { Inject, Injectable, Logger } from '@nestjs/common';
import { ElevenLabsClient } from '@elevenlabs/elevenlabs-js';
import { writeFile } from 'fs/promises';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { DEFAULT_VOICE_SETTINGS, resolveVoiceId } from './voices';

@Injectable()
export class SpeechSynthesizer {
  private readonly logger = new Logger(SpeechSynthesizer.name);
  private client: ElevenLabsClient | null = null;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async synthesize(
    text: string,
    outputPath: string,
    voice: string | null,
    signal?: AbortSignal,
  ): Promise<void> {
    const voiceId = resolveVoiceId(voice, this.config.elevenlabs.defaultVoice);
    const startedAt = Date.now();
    const audio = await this.getClient().textToSpeech.convert(
      voiceId,
      {
        text,
        modelId: this.config.elevenlabs.modelId,
        voiceSettings: DEFAULT_VOICE_SETTINGS,
      },
      { abortSignal: signal },
    );
    const buffer = Buffer.from(await new Response(audio).arrayBuffer());
    await writeFile(outputPath, buffer);
    this.logger.log(
      `Narration written to ${outputPath} (${buffer.length} bytes, ${Date.now() - startedAt}ms)`,
    );
  }

  private getClient(): ElevenLabsClient {
    const apiKey = this.config.elevenlabs.apiKey;
    if (!apiKey) {
      throw new Error('ELEVENLABS_API_KEY environment variable is required');
    }
    this.client ??= new ElevenLabsClient({ apiKey });
    return this.client;
  }
}
