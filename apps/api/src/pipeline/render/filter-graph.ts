export const FRAME_WIDTH = 1080;
export const FRAME_HEIGHT = 1920;
export const FRAME_RATE = 25;

const CAPTION_STYLE =
  'Fontname=DejaVu Sans,Fontsize=16,PrimaryColour=&H00FFFFFF,OutlineColour=&H00000000,BorderStyle=1,Outline=2,Alignment=2,MarginV=120';

/**
 * Escapes a value for use inside a single-quoted filter option. Colons and
 * backslashes are significant to the option parser even inside quotes.
 */
export function escapeFilterValue(value: string): string {
  return value.replace(/\\/g, '/').replace(/:/g, '\\:').replace(/'/g, "'\\''");
}

/**
 * Builds the -filter_complex graph for the background track: every input
 * `i` is fitted to a portrait frame, cut to `durations[i]` seconds and
 * concatenated in order; captions are burned on top when a subtitle file is
 * given. The graph's output label is `[vout]`.
 */
export function buildFilterGraph(durations: number[], subtitlesPath: string | null): string {
  if (durations.length === 0) {
    throw new Error('At least one background input is required');
  }
  const parts = durations.map(
    (duration, index) =>
      `[${index}:v]scale=${FRAME_WIDTH}:${FRAME_HEIGHT}:force_original_aspect_ratio=increase,` +
      `crop=${FRAME_WIDTH}:${FRAME_HEIGHT},setsar=1,fps=${FRAME_RATE},` +
      `trim=duration=${duration.toFixed(3)},setpts=PTS-STARTPTS[v${index}]`,
  );
  const labels = durations.map((_, index) => `[v${index}]`).join('');
  const concatOutput = subtitlesPath ? '[vcat]' : '[vout]';
  parts.push(`${labels}concat=n=${durations.length}:v=1:a=0${concatOutput}`);
  if (subtitlesPath) {
    parts.push(
      `[vcat]subtitles='${escapeFilterValue(subtitlesPath)}':force_style='${CAPTION_STYLE}'[vout]`,
    );
  }
  return parts.join(';');
}
