export interface ClipSlot {
  start: number;
  end: number;
  url: string | null;
}

export interface TimedClip {
  start: number;
  end: number;
  url: string;
}

/**
 * Scenes for which no footage was found are covered by stretching the
 * neighbouring clip: a gap extends the clip before it, and leading gaps are
 * absorbed by the first clip found. Adjacent slots of the same clip collapse.
 */
export function mergeEmptyIntervals(slots: ClipSlot[]): TimedClip[] {
  const merged: TimedClip[] = [];
  let leadingStart: number | null = null;

  for (const slot of slots) {
    const previous = merged[merged.length - 1];
    if (slot.url === null) {
      if (previous) {
        previous.end = slot.end;
      } else if (leadingStart === null) {
        leadingStart = slot.start;
      }
      continue;
    }
    if (previous && previous.url === slot.url) {
      previous.end = slot.end;
      continue;
    }
    merged.push({ start: leadingStart ?? slot.start, end: slot.end, url: slot.url });
    leadingStart = null;
  }
  return merged;
}
