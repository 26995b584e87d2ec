import { Inject, Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { TimedText } from '../captions/captions';
import { parseScriptContent, parseSearchTerms } from './parse-script';

const SCRIPT_PROMPT = `You write scripts for a YouTube Shorts channel that publishes facts videos.
Each short lasts under 50 seconds when read aloud (about 140 words), is engaging and original,
and is built around the kind of facts the user asks for.

For example, if the user asks for "Weird facts", you might write:

Weird facts you don't know:
- Bananas are berries, but strawberries aren't.
- A single cloud can weigh over a million pounds.
- Octopuses have three hearts and blue blood.

Write the best short script for the user's request. Keep it brief, interesting and unique.
Respond with a single JSON object with the key "script" and nothing else:
{"script": "Here is the script ..."}`;

const SEARCH_TERMS_PROMPT = `You pick stock footage for a short vertical video.
You receive the narration script and its scenes, numbered in order.
For every scene return three short visual search queries (one to three words each) that
describe footage a stock library would have for that moment, most specific first.
Queries must be concrete and visual; avoid abstract words.
Respond with a single JSON object: {"queries": [["query", "query", "query"], ...]}
with exactly one inner list per scene, in scene order.`;

interface ChatCompletionResponse {
  choices: Array<{ message?: { content?: string | null } }>;
}

@Injectable()
export class ScriptGenerator {
  private readonly logger = new Logger(ScriptGenerator.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async generateScript(topic: string, signal?: AbortSignal): Promise<string> {
    const content = await this.complete(SCRIPT_PROMPT, topic, signal);
    const script = parseScriptContent(content);
    this.logger.debug(`Script generated (${script.length} chars)`);
    return script;
  }

  async generateSearchTerms(
    script: string,
    scenes: TimedText[],
    signal?: AbortSignal,
  ): Promise<string[][]> {
    const numbered = scenes.map((scene, index) => `${index + 1}. ${scene.text}`).join('\n');
    const content = await this.complete(
      SEARCH_TERMS_PROMPT,
      `Script:\n${script}\n\nScenes:\n${numbered}`,
      signal,
    );
    return parseSearchTerms(content, scenes.length);
  }

  private async complete(system: string, user: string, signal?: AbortSignal): Promise<string> {
    const { apiKey, model, baseUrl } = this.config.openai;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY environment variable is required');
    }
    const { data } = await axios.post<ChatCompletionResponse>(
      `${baseUrl}/chat/completions`,
      {
        model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
        response_format: { type: 'json_object' },
      },
      {
        headers: { Authorization: `Bearer ${apiKey}` },
        timeout: 120_000,
        signal,
      },
    );
    const content = data.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Model returned an empty response');
    }
    return content;
  }
}
