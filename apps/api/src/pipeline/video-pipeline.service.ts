import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, rm } from 'fs/promises';
import { join, resolve } from 'path';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { TimedText, buildCaptions, buildScenes, captionsFromWords } from './captions/captions';
import { NarrationTranscriber } from './captions/transcription.service';
import { StockFootageService } from './footage/stock-footage.service';
import { PipelineError, PipelineStep, describeError } from './pipeline.errors';
import { RenderService } from './render/render.service';
import { ScriptGenerator } from './script/script-generator.service';
import { SpeechSynthesizer } from './speech/speech.service';
import { ARTIFACT_STORAGE, ArtifactStorage, remoteVideoName } from './storage/artifact-storage';

export interface PipelineRequest {
  jobId: string;
  text: string;
  voice: string | null;
}

export interface PipelineHooks {
  signal: AbortSignal;
  onProgress(step: string, percent: number): Promise<void>;
}

export interface PipelineResult {
  script: string;
  /** Remote URL after an upload, otherwise the local file path. */
  resultLocation: string;
  /** Set when the video stays on local disk. */
  localPath: string | null;
}

export function localVideoPath(outputDir: string, jobId: string): string {
  return join(resolve(outputDir), `video_${jobId}.mp4`);
}

@Injectable()
export class VideoPipeline {
  private readonly logger = new Logger(VideoPipeline.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly scripts: ScriptGenerator,
    private readonly speech: SpeechSynthesizer,
    private readonly footage: StockFootageService,
    private readonly renderer: RenderService,
    private readonly transcriber: NarrationTranscriber,
    @Inject(ARTIFACT_STORAGE) private readonly storage: ArtifactStorage | null,
  ) {}

  async run(request: PipelineRequest, hooks: PipelineHooks): Promise<PipelineResult> {
    const { jobId, text, voice } = request;
    const { signal, onProgress } = hooks;
    const outputDir = resolve(this.config.jobs.outputDir);
    const workDir = join(outputDir, 'work', jobId);
    const outputPath = localVideoPath(outputDir, jobId);

    const step = async <T>(name: PipelineStep, label: string, percent: number, fn: () => Promise<T>) => {
      signal.throwIfAborted();
      await onProgress(label, percent);
      try {
        return await fn();
      } catch (err) {
        if (signal.aborted) throw err;
        throw new PipelineError(name, err);
      }
    };

    await mkdir(workDir, { recursive: true });
    try {
      const script = await step('script', 'Generating script...', 10, () =>
        this.scripts.generateScript(text, signal),
      );

      const audioPath = join(workDir, 'narration.mp3');
      await step('audio', 'Generating audio...', 25, () =>
        this.speech.synthesize(script, audioPath, voice, signal),
      );

      const { duration, captions, scenes } = await step('captions', 'Generating captions...', 40, async () => {
        const seconds = await this.renderer.audioDuration(audioPath);
        return {
          duration: seconds,
          captions: await this.timedCaptions(jobId, script, audioPath, seconds, signal),
          scenes: buildScenes(script, seconds),
        };
      });

      const terms = await step('search terms', 'Finding background videos...', 55, () =>
        this.scripts.generateSearchTerms(script, scenes, signal),
      );

      const clips = await step('footage', 'Downloading videos...', 70, async () => {
        const found = await this.footage.findClips(scenes, terms, signal);
        return this.footage.download(found, workDir, signal);
      });

      await step('render', 'Rendering video...', 85, () =>
        this.renderer.render(
          { audioPath, durationSeconds: duration, clips, captions, workDir, outputPath },
          signal,
        ),
      );

      const storage = this.storage;
      if (!storage) {
        return { script, resultLocation: outputPath, localPath: outputPath };
      }
      const uploaded = await step('upload', 'Uploading to cloud storage...', 95, () =>
        storage.upload(outputPath, remoteVideoName(jobId)),
      );
      await rm(outputPath, { force: true });
      this.logger.log(`[${jobId}] Uploaded to ${uploaded.provider}: ${uploaded.key}`);
      return { script, resultLocation: uploaded.url, localPath: null };
    } catch (err) {
      await rm(outputPath, { force: true });
      throw err;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  /** Captions on the transcribed word timings, or spread over the script when those are unavailable. */
  private async timedCaptions(
    jobId: string,
    script: string,
    audioPath: string,
    seconds: number,
    signal: AbortSignal,
  ): Promise<TimedText[]> {
    try {
      const captions = captionsFromWords(await this.transcriber.wordTimings(audioPath, signal));
      if (captions.length > 0) return captions;
      this.logger.warn(`[${jobId}] Transcription returned no words, estimating caption timing`);
    } catch (err) {
      if (signal.aborted) throw err;
      this.logger.warn(`[${jobId}] Word timings unavailable, estimating caption timing: ${describeError(err)}`);
    }
    return buildCaptions(script, seconds);
  }
}
