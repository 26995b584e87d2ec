import { clipDurations } from './render.service';
import { buildFilterGraph, escapeFilterValue } from './filter-graph';

const fit = 'scale=1080:1920:force_original_aspect_ratio=increase,crop=1080:1920,setsar=1,fps=25';

describe('buildFilterGraph', () => {
  it('fits, trims and concatenates every input, then burns in captions', () => {
    const parts = buildFilterGraph([2, 3.5], '/tmp/work/captions.srt').split(';');

    expect(parts).toHaveLength(4);
    expect(parts[0]).toBe(`[0:v]${fit},trim=duration=2.000,setpts=PTS-STARTPTS[v0]`);
    expect(parts[1]).toBe(`[1:v]${fit},trim=duration=3.500,setpts=PTS-STARTPTS[v1]`);
    expect(parts[2]).toBe('[v0][v1]concat=n=2:v=1:a=0[vcat]');
    expect(parts[3]).toMatch(/^\[vcat\]subtitles='\/tmp\/work\/captions\.srt':force_style='.+'\[vout\]$/);
  });

  it('ends at the concat when there are no captions', () => {
    expect(buildFilterGraph([5], null)).toBe(
      `[0:v]${fit},trim=duration=5.000,setpts=PTS-STARTPTS[v0];[v0]concat=n=1:v=1:a=0[vout]`,
    );
  });

  it('needs at least one input', () => {
    expect(() => buildFilterGraph([], null)).toThrow('At least one background input is required');
  });
});

describe('escapeFilterValue', () => {
  it('escapes separators and quotes', () => {
    expect(escapeFilterValue("C:\\videos\\it's.srt")).toBe("C\\:/videos/it'\\''s.srt");
  });
});

describe('clipDurations', () => {
  it('runs the last clip to the end of the narration', () => {
    expect(
      clipDurations(
        [
          { start: 0, end: 2 },
          { start: 2, end: 5 },
        ],
        6,
      ),
    ).toEqual([2, 4]);
  });

  it('never shortens the last clip below its scene', () => {
    expect(clipDurations([{ start: 0, end: 3 }], 2)).toEqual([3]);
  });
});
