import { google, type youtube_v3 } from 'googleapis';
import { NoCaptionsError } from '../errors.js';
import type { Caption, CaptionTrack } from '../../types/index.js';

const VIDEO_ID_PATTERN = /^[a-zA-Z0-9_-]{11}$/;

export const DEFAULT_LANGUAGES: readonly string[] = ['es', 'en'];

// Comma-separated language codes in priority order; blank input means the defaults
export function parseLanguages(raw: string): string[] {
  const languages = raw
    .split(',')
    .map((lang) => lang.trim())
    .filter((lang) => lang.length > 0);
  return languages.length > 0 ? languages : [...DEFAULT_LANGUAGES];
}

export interface TimedTextEvent {
  tStartMs?: number;
  dDurationMs?: number;
  segs?: Array<{ utf8?: string }>;
}

export interface YouTubeClientOptions {
  // Random pause before hitting the timedtext endpoint, to avoid rate limiting
  scrapeDelayMs?: { min: number; max: number };
}

export class YouTubeClient {
  private youtube: youtube_v3.Youtube;
  private scrapeDelayMs: { min: number; max: number };

  constructor(apiKey: string, options: YouTubeClientOptions = {}) {
    this.youtube = google.youtube({
      version: 'v3',
      auth: apiKey,
    });
    this.scrapeDelayMs = options.scrapeDelayMs ?? { min: 3000, max: 6000 };
  }

  parseVideoId(url: string): string {
    const value = url.trim();
    if (VIDEO_ID_PATTERN.test(value)) return value;

    const patterns = [
      /[?&]v=([a-zA-Z0-9_-]{11})/,
      /youtu\.be\/([a-zA-Z0-9_-]{11})/,
      /youtube\.com\/live\/([a-zA-Z0-9_-]{11})/,
      /youtube\.com\/shorts\/([a-zA-Z0-9_-]{11})/,
      /youtube\.com\/embed\/([a-zA-Z0-9_-]{11})/,
    ];

    for (const pattern of patterns) {
      const match = value.match(pattern);
      if (match) return match[1];
    }

    throw new Error('Invalid video URL');
  }

  private async randomDelay(): Promise<void> {
    const { min, max } = this.scrapeDelayMs;
    if (max <= 0) return;
    const delay = min + Math.random() * (max - min);
    return new Promise((resolve) => setTimeout(resolve, delay));
  }

  async listCaptionTracks(videoId: string): Promise<CaptionTrack[]> {
    const response = await this.youtube.captions.list({
      part: ['snippet'],
      videoId,
    });

    return (response.data.items || []).map((track): CaptionTrack => {
      const isAsr = track.snippet?.trackKind?.toLowerCase() === 'asr';
      return {
        id: track.id || '',
        videoId,
        language: track.snippet?.name || track.snippet?.language || '',
        languageCode: track.snippet?.language || '',
        trackKind: isAsr ? 'ASR' : track.snippet?.trackKind === 'forced' ? 'forced' : 'standard',
        isAutoGenerated: isAsr,
      };
    });
  }

  /**
   * Pick a track: manual caption in a preferred language, then an
   * auto-generated one in a preferred language, then anything.
   */
  selectTrack(tracks: CaptionTrack[], preferredLanguages: readonly string[]): CaptionTrack | null {
    for (const lang of preferredLanguages) {
      const manual = tracks.find((t) => !t.isAutoGenerated && t.languageCode.startsWith(lang));
      if (manual) return manual;
    }

    for (const lang of preferredLanguages) {
      const asr = tracks.find((t) => t.isAutoGenerated && t.languageCode.startsWith(lang));
      if (asr) return asr;
    }

    return tracks.find((t) => !t.isAutoGenerated) || tracks[0] || null;
  }

  async getCaptions(videoId: string, preferredLanguages: readonly string[] = DEFAULT_LANGUAGES): Promise<Caption[]> {
    const tracks = await this.listCaptionTracks(videoId);
    const track = this.selectTrack(tracks, preferredLanguages);

    if (!track) {
      throw new NoCaptionsError(videoId, 'the video has no caption tracks');
    }

    // Random delay before scraping to avoid rate limiting
    await this.randomDelay();
    const captions = await this.downloadTimedText(videoId, track);

    if (captions.length === 0) {
      throw new NoCaptionsError(videoId, `track "${track.languageCode}" returned no text`);
    }
    return captions;
  }

  private async downloadTimedText(videoId: string, track: CaptionTrack): Promise<Caption[]> {
    const params = new URLSearchParams({ v: videoId, lang: track.languageCode, fmt: 'json3' });
    if (track.isAutoGenerated) {
      params.set('kind', 'asr');
    }

    const response = await fetch(`https://www.youtube.com/api/timedtext?${params.toString()}`, {
      headers: {
        'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
      },
    });

    if (!response.ok) {
      throw new NoCaptionsError(videoId, `timedtext request failed with HTTP ${response.status}`);
    }

    const body = await response.text();
    if (!body.trim()) return [];

    let data: { events?: TimedTextEvent[] };
    try {
      data = JSON.parse(body) as { events?: TimedTextEvent[] };
    } catch (error) {
      throw new NoCaptionsError(videoId, 'timedtext response is not JSON', { cause: error });
    }
    return this.parseTimedText(data.events || []);
  }

  parseTimedText(events: TimedTextEvent[]): Caption[] {
    const captions: Caption[] = [];

    for (const event of events) {
      if (!event.segs) continue;

      const text = event.segs
        .map((seg) => seg.utf8 ?? '')
        .join('')
        .replace(/\s*\n\s*/g, ' ')
        .trim();
      if (!text) continue;

      captions.push({
        startSeconds: (event.tStartMs || 0) / 1000,
        durationSeconds: (event.dDurationMs || 0) / 1000,
        text,
      });
    }

    return captions;
  }
}
