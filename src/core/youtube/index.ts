export { YouTubeClient, DEFAULT_LANGUAGES, parseLanguages, type YouTubeClientOptions, type TimedTextEvent } from './client.js';
