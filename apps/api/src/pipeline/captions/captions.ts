export interface TimedText {
  start: number;
  end: number;
  text: string;
}

/** A spoken word with its position in the narration, in seconds. */
export interface TimedWord {
  word: string;
  start: number;
  end: number;
}

const MAX_CAPTION_WORDS = 4;
const MIN_SCENE_SECONDS = 2;

export function splitSentences(script: string): string[] {
  return script
    .replace(/\s+/g, ' ')
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Spreads the narration duration over the script proportionally to word count.
 * There is no forced alignment, so timings are an estimate of the spoken pace.
 */
function timeline(script: string, durationSeconds: number) {
  const total = words(script).length;
  const secondsPerWord = total > 0 ? durationSeconds / total : 0;
  return { total, at: (wordIndex: number) => round(wordIndex * secondsPerWord) };
}

export function buildCaptions(
  script: string,
  durationSeconds: number,
  maxWords: number = MAX_CAPTION_WORDS,
): TimedText[] {
  const all = words(script);
  const { at } = timeline(script, durationSeconds);
  const captions: TimedText[] = [];
  for (let i = 0; i < all.length; i += maxWords) {
    const chunk = all.slice(i, i + maxWords);
    captions.push({ start: at(i), end: at(i + chunk.length), text: chunk.join(' ') });
  }
  return captions;
}

/** Captions that follow the narration's measured word timings. */
export function captionsFromWords(timed: TimedWord[], maxWords: number = MAX_CAPTION_WORDS): TimedText[] {
  const spoken = timed
    .map((entry) => ({ ...entry, word: entry.word.trim() }))
    .filter((entry) => entry.word.length > 0);
  const captions: TimedText[] = [];
  for (let i = 0; i < spoken.length; i += maxWords) {
    const chunk = spoken.slice(i, i + maxWords);
    const first = chunk[0];
    const last = chunk[chunk.length - 1];
    if (!first || !last) break;
    captions.push({
      start: round(first.start),
      end: round(Math.max(first.start, last.end)),
      text: chunk.map((entry) => entry.word).join(' '),
    });
  }
  return captions;
}

/**
 * One scene per sentence; a scene shorter than `minSeconds` is folded into the
 * following one, or into the previous one when it is last.
 */
export function buildScenes(
  script: string,
  durationSeconds: number,
  minSeconds: number = MIN_SCENE_SECONDS,
): TimedText[] {
  const { at } = timeline(script, durationSeconds);
  const scenes: TimedText[] = [];
  let wordIndex = 0;
  let pending: TimedText | null = null;

  for (const sentence of splitSentences(script)) {
    const count = words(sentence).length;
    const start: number = pending ? pending.start : at(wordIndex);
    const text: string = pending ? `${pending.text} ${sentence}` : sentence;
    wordIndex += count;
    const scene: TimedText = { start, end: at(wordIndex), text };
    if (scene.end - scene.start < minSeconds) {
      pending = scene;
    } else {
      scenes.push(scene);
      pending = null;
    }
  }

  if (pending) {
    const last = scenes.pop();
    scenes.push(
      last ? { start: last.start, end: pending.end, text: `${last.text} ${pending.text}` } : pending,
    );
  }
  return scenes;
}

export function toSrt(captions: TimedText[]): string {
  return captions
    .map(
      (caption, index) =>
        `${index + 1}\n${srtTimestamp(caption.start)} --> ${srtTimestamp(caption.end)}\n${caption.text}\n`,
    )
    .join('\n');
}

export function srtTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const s = totalSeconds % 60;
  const m = Math.floor(totalSeconds / 60) % 60;
  const h = Math.floor(totalSeconds / 3600);
  return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)},${pad(ms, 3)}`;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}
