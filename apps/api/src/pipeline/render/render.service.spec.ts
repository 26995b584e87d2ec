import ffmpeg from 'fluent-ffmpeg';
import { readFile, rm } from 'fs/promises';
import { join } from 'path';
import { Deferred, tempDir } from '../../../test/helpers';
import { buildFilterGraph } from './filter-graph';
import { RenderRequest, RenderService, readDuration } from './render.service';

/** Hands out one command object so its calls can be observed without running ffmpeg. */
class ObservedRenderService extends RenderService {
  readonly command = ffmpeg();

  protected createCommand(): ffmpeg.FfmpegCommand {
    return this.command;
  }
}

describe('RenderService', () => {
  let workDir: string;
  let service: ObservedRenderService;
  let saved: Deferred<void>;

  function request(overrides: Partial<RenderRequest> = {}): RenderRequest {
    return {
      audioPath: join(workDir, 'narration.mp3'),
      durationSeconds: 6,
      clips: [],
      captions: [],
      workDir,
      outputPath: join(workDir, 'video.mp4'),
      ...overrides,
    };
  }

  /** Makes `save` record the call instead of spawning ffmpeg, then finish with `outcome`. */
  function saveThen(outcome: 'end' | Error | 'hang') {
    return jest.spyOn(service.command, 'save').mockImplementation(() => {
      saved.resolve();
      if (outcome === 'end') {
        setImmediate(() => service.command.emit('end'));
      } else if (outcome instanceof Error) {
        setImmediate(() => service.command.emit('error', outcome));
      }
      return service.command;
    });
  }

  beforeEach(async () => {
    workDir = await tempDir();
    service = new ObservedRenderService();
    saved = new Deferred<void>();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('renders on a black lavfi background when there is no footage', async () => {
    const save = saveThen('end');
    const input = jest.spyOn(service.command, 'input');
    const inputFormat = jest.spyOn(service.command, 'inputFormat');
    const outputOptions = jest.spyOn(service.command, 'outputOptions');
    const complexFilter = jest.spyOn(service.command, 'complexFilter');

    await service.render(request());

    expect(input).toHaveBeenNthCalledWith(1, 'color=c=black:s=1080x1920:r=25');
    expect(inputFormat).toHaveBeenCalledWith('lavfi');
    expect(input).toHaveBeenNthCalledWith(2, join(workDir, 'narration.mp3'));
    expect(complexFilter).toHaveBeenCalledWith(buildFilterGraph([6], null));
    expect(outputOptions).toHaveBeenCalledWith(
      expect.arrayContaining(['-map', '[vout]', '-map', '1:a', '-shortest']),
    );
    expect(save).toHaveBeenCalledWith(join(workDir, 'video.mp4'));
  });

  it('loops every clip and maps the narration after them', async () => {
    saveThen('end');
    const input = jest.spyOn(service.command, 'input');
    const inputOptions = jest.spyOn(service.command, 'inputOptions');
    const outputOptions = jest.spyOn(service.command, 'outputOptions');
    const complexFilter = jest.spyOn(service.command, 'complexFilter');
    const clips = [
      { start: 0, end: 2, url: 'https://videos.example.com/a.mp4', path: join(workDir, 'clip_0.mp4') },
      { start: 2, end: 5, url: 'https://videos.example.com/b.mp4', path: join(workDir, 'clip_1.mp4') },
    ];
    const subtitlesPath = join(workDir, 'captions.srt');

    await service.render(request({ clips, captions: [{ start: 0, end: 1.5, text: 'Dolphins sleep' }] }));

    expect(input.mock.calls.map(([path]) => path)).toEqual([
      join(workDir, 'clip_0.mp4'),
      join(workDir, 'clip_1.mp4'),
      join(workDir, 'narration.mp3'),
    ]);
    expect(inputOptions).toHaveBeenCalledTimes(2);
    expect(inputOptions).toHaveBeenCalledWith(['-stream_loop', '-1']);
    expect(complexFilter).toHaveBeenCalledWith(buildFilterGraph([2, 4], subtitlesPath));
    expect(outputOptions).toHaveBeenCalledWith(expect.arrayContaining(['-map', '[vout]', '-map', '2:a']));
    expect(await readFile(subtitlesPath, 'utf8')).toBe('1\n00:00:00,000 --> 00:00:01,500\nDolphins sleep\n');
  });

  it('kills ffmpeg and rejects when aborted mid-render', async () => {
    saveThen('hang');
    const kill = jest.spyOn(service.command, 'kill').mockImplementation(() => service.command);
    const controller = new AbortController();

    const rendering = service.render(request(), controller.signal);
    await saved.promise;
    controller.abort(new Error('Job cancelled'));

    await expect(rendering).rejects.toThrow('Render aborted');
    expect(kill).toHaveBeenCalledWith('SIGKILL');
  });

  it('never starts ffmpeg once already aborted', async () => {
    const save = saveThen('end');
    const controller = new AbortController();
    controller.abort(new Error('Job cancelled'));

    await expect(service.render(request(), controller.signal)).rejects.toThrow('Render aborted');
    expect(save).not.toHaveBeenCalled();
  });

  it('passes ffmpeg errors through', async () => {
    saveThen(new Error('ffmpeg exited with code 1'));

    await expect(service.render(request())).rejects.toThrow('ffmpeg exited with code 1');
  });
});

describe('readDuration', () => {
  it('returns a positive duration', () => {
    expect(readDuration({ format: { duration: 12.5 } }, 'narration.mp3')).toBe(12.5);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY, undefined])('rejects %p', (duration) => {
    expect(() => readDuration({ format: { duration } }, 'narration.mp3')).toThrow(
      'Could not read duration of narration.mp3',
    );
  });
});
