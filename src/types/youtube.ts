export type CaptionTrackKind = 'standard' | 'ASR' | 'forced';

export interface CaptionTrack {
  id: string;
  videoId: string;
  language: string; // display name, e.g. "Español"
  languageCode: string;
  trackKind: CaptionTrackKind;
  isAutoGenerated: boolean;
}
