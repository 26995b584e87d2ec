import { Injectable, Logger } from '@nestjs/common';
import ffmpeg from 'fluent-ffmpeg';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { TimedText, toSrt } from '../captions/captions';
import { DownloadedClip } from '../footage/stock-footage.service';
import { FRAME_HEIGHT, FRAME_RATE, FRAME_WIDTH, buildFilterGraph } from './filter-graph';

export interface RenderRequest {
  audioPath: string;
  durationSeconds: number;
  clips: DownloadedClip[];
  captions: TimedText[];
  workDir: string;
  outputPath: string;
}

/**
 * Seconds each clip stays on screen. The last clip runs to the end of the
 * narration so trailing audio never plays over a frozen frame.
 */
export function clipDurations(clips: Pick<DownloadedClip, 'start' | 'end'>[], total: number): number[] {
  return clips.map((clip, index) => {
    const end = index === clips.length - 1 ? Math.max(clip.end, total) : clip.end;
    return Math.max(0.04, end - clip.start);
  });
}

/** Positive, finite duration from ffprobe output. */
export function readDuration(metadata: Pick<ffmpeg.FfprobeData, 'format'>, path: string): number {
  const duration = metadata.format.duration;
  if (typeof duration !== 'number' || !Number.isFinite(duration) || duration <= 0) {
    throw new Error(`Could not read duration of ${path}`);
  }
  return duration;
}

@Injectable()
export class RenderService {
  private readonly logger = new Logger(RenderService.name);

  audioDuration(path: string): Promise<number> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(path, (err: unknown, metadata) => {
        if (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
          return;
        }
        try {
          resolve(readDuration(metadata, path));
        } catch (readErr) {
          reject(readErr);
        }
      });
    });
  }

  async render(request: RenderRequest, signal?: AbortSignal): Promise<void> {
    const { audioPath, durationSeconds, clips, captions, workDir, outputPath } = request;

    let subtitlesPath: string | null = null;
    if (captions.length > 0) {
      subtitlesPath = join(workDir, 'captions.srt');
      await writeFile(subtitlesPath, toSrt(captions), 'utf8');
    }

    const command = this.createCommand();
    let durations: number[];
    if (clips.length > 0) {
      for (const clip of clips) {
        command.input(clip.path).inputOptions(['-stream_loop', '-1']);
      }
      durations = clipDurations(clips, durationSeconds);
    } else {
      this.logger.warn('No background footage, rendering on a plain background');
      command
        .input(`color=c=black:s=${FRAME_WIDTH}x${FRAME_HEIGHT}:r=${FRAME_RATE}`)
        .inputFormat('lavfi');
      durations = [durationSeconds];
    }
    const audioIndex = durations.length;
    command.input(audioPath);

    const startedAt = Date.now();
    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        command.kill('SIGKILL');
        reject(new Error('Render aborted'));
      };
      if (signal?.aborted) {
        reject(new Error('Render aborted'));
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      command
        .complexFilter(buildFilterGraph(durations, subtitlesPath))
        .outputOptions([
          '-map', '[vout]',
          '-map', `${audioIndex}:a`,
          '-c:v', 'libx264',
          '-preset', 'veryfast',
          '-pix_fmt', 'yuv420p',
          '-r', String(FRAME_RATE),
          '-c:a', 'aac',
          '-b:a', '192k',
          '-shortest',
          '-movflags', '+faststart',
        ])
        .on('end', () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        })
        .on('error', (err: Error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        })
        .save(outputPath);
    });
    this.logger.log(`Rendered ${outputPath} in ${Date.now() - startedAt}ms`);
  }

  protected createCommand(): ffmpeg.FfmpegCommand {
    return ffmpeg();
  }
}
