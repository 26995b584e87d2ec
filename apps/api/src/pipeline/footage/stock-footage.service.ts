import { Inject, Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import { createWriteStream } from 'fs';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { TimedText } from '../captions/captions';
import { FRAME_HEIGHT, FRAME_WIDTH } from '../render/filter-graph';
import { ClipSlot, TimedClip, mergeEmptyIntervals } from './merge-intervals';

const PEXELS_SEARCH_URL = 'https://api.pexels.com/videos/search';

export interface PexelsVideoFile {
  id: number;
  quality: string | null;
  file_type: string;
  width: number | null;
  height: number | null;
  link: string;
}

export interface PexelsVideo {
  id: number;
  width: number;
  height: number;
  duration: number;
  video_files: PexelsVideoFile[];
}

interface PexelsSearchResponse {
  videos: PexelsVideo[];
}

export interface PickedFile {
  videoId: number;
  url: string;
}

export interface DownloadedClip extends TimedClip {
  path: string;
}

/**
 * Picks the mp4 rendition closest to a 1080x1920 portrait frame, skipping
 * videos already used for an earlier scene.
 */
export function pickVideoFile(videos: PexelsVideo[], usedVideoIds: ReadonlySet<number>): PickedFile | null {
  let best: { file: PexelsVideoFile; videoId: number; distance: number } | null = null;
  for (const video of videos) {
    if (usedVideoIds.has(video.id)) continue;
    for (const file of video.video_files) {
      if (!file.width || !file.height || file.height <= file.width) continue;
      if (file.file_type !== 'video/mp4') continue;
      const distance = Math.abs(file.width - FRAME_WIDTH) + Math.abs(file.height - FRAME_HEIGHT);
      if (!best || distance < best.distance) {
        best = { file, videoId: video.id, distance };
      }
    }
  }
  return best ? { videoId: best.videoId, url: best.file.link } : null;
}

@Injectable()
export class StockFootageService {
  private readonly logger = new Logger(StockFootageService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async findClips(scenes: TimedText[], terms: string[][], signal?: AbortSignal): Promise<TimedClip[]> {
    const used = new Set<number>();
    const slots: ClipSlot[] = [];
    for (const [index, scene] of scenes.entries()) {
      let url: string | null = null;
      for (const query of terms[index] ?? []) {
        const picked = pickVideoFile(await this.search(query, signal), used);
        if (picked) {
          used.add(picked.videoId);
          url = picked.url;
          break;
        }
      }
      if (!url) {
        this.logger.warn(`No footage for scene ${index + 1}: "${scene.text.slice(0, 60)}"`);
      }
      slots.push({ start: scene.start, end: scene.end, url });
    }
    return mergeEmptyIntervals(slots);
  }

  async download(clips: TimedClip[], directory: string, signal?: AbortSignal): Promise<DownloadedClip[]> {
    const paths = new Map<string, string>();
    const downloaded: DownloadedClip[] = [];
    for (const clip of clips) {
      let path = paths.get(clip.url);
      if (!path) {
        path = join(directory, `clip_${paths.size}.mp4`);
        const response = await axios.get<Readable>(clip.url, {
          responseType: 'stream',
          timeout: 120_000,
          signal,
        });
        await pipeline(response.data, createWriteStream(path));
        paths.set(clip.url, path);
      }
      downloaded.push({ ...clip, path });
    }
    return downloaded;
  }

  private async search(query: string, signal?: AbortSignal): Promise<PexelsVideo[]> {
    const apiKey = this.config.pexels.apiKey;
    if (!apiKey) {
      throw new Error('PEXELS_API_KEY environment variable is required');
    }
    const { data } = await axios.get<PexelsSearchResponse>(PEXELS_SEARCH_URL, {
      params: { query, orientation: 'portrait', per_page: 15 },
      headers: { Authorization: apiKey },
      timeout: 30_000,
      signal,
    });
    return data.videos ?? [];
  }
}
