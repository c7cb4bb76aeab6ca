import { config as loadEnv } from 'dotenv';
import type { GeminiClientConfig } from '../../core/gemini/index.js';

loadEnv();

export const DEFAULT_MODEL = 'gemini-2.5-flash';

export function requireGeminiConfig(model?: string): GeminiClientConfig {
  const apiKey = process.env.GEMINI_API_KEY;
  const projectId = process.env.GOOGLE_CLOUD_PROJECT;
  const location = process.env.GOOGLE_CLOUD_LOCATION || 'us-central1';

  if (!apiKey && !projectId) {
    console.error('❌ Falta GOOGLE_CLOUD_PROJECT (Vertex AI) o GEMINI_API_KEY en el entorno o .env');
    process.exit(1);
  }

  return {
    apiKey,
    projectId,
    location,
    model: model || process.env.GEMINI_MODEL || DEFAULT_MODEL,
  };
}

export function requireYouTubeApiKey(): string {
  const youtubeApiKey = process.env.YOUTUBE_API_KEY;
  if (!youtubeApiKey) {
    console.error('❌ Falta YOUTUBE_API_KEY en el entorno o .env');
    process.exit(1);
  }
  return youtubeApiKey;
}
