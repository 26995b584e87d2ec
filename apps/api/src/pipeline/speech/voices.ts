export const VOICE_IDS = {
  adam: 'pNInz6obpgDQGcFmaJgB',
  antoni: 'ErXwobaYiN019PkySvjV',
  arnold: 'VR6AewLTigWG4xSOukaG',
  bella: 'EXAVITQu4vr4xnSDxMaL',
  domi: 'AZnzlk1XvdvUeBnXmlld',
  elli: 'MF3mGyEYCl7XYWbV9V6O',
  josh: 'TxGEqnHWrfWFTfGW9XjX',
  rachel: '21m00Tcm4TlvDq8ikWAM',
  sam: 'yoZ06aMxZJJ28mfd3POQ',
} as const;

export type VoiceName = keyof typeof VOICE_IDS;

export const VOICE_NAMES: VoiceName[] = Object.keys(VOICE_IDS).filter(isVoiceName);

export const DEFAULT_VOICE_SETTINGS = {
  stability: 0.5,
  similarityBoost: 0.5,
  style: 0,
  useSpeakerBoost: true,
};

export function isVoiceName(value: string): value is VoiceName {
  return Object.prototype.hasOwnProperty.call(VOICE_IDS, value);
}

/** Unknown names fall back to the configured default, then to adam. */
export function resolveVoiceId(requested: string | null | undefined, fallback: string): string {
  if (requested && isVoiceName(requested)) return VOICE_IDS[requested];
  if (isVoiceName(fallback)) return VOICE_IDS[fallback];
  return VOICE_IDS.adam;
}
