/**
 * API Endpoint Constants
 *
 * Every endpoint path the client calls is named here. A configuration may
 * swap the whole table (e.g. for a proxy that mounts the API elsewhere).
 */

export interface ApiPaths {
  readonly completions: string;
  readonly embeddings: string;
  readonly chats: string;
  readonly edits: string;
  readonly models: string;
  readonly moderations: string;
  readonly audioSpeech: string;
  readonly audioTranscriptions: string;
  readonly audioTranslations: string;
  readonly images: string;
  readonly imageEdits: string;
  readonly imageVariations: string;
}

/**
 * Version 1 of the HTTP API
 */
export const V1_API_PATHS: ApiPaths = {
  /** Legacy text completions */
  completions: '/v1/completions',

  /** Embeddings */
  embeddings: '/v1/embeddings',

  /** Chat completions */
  chats: '/v1/chat/completions',

  /** Instruction edits */
  edits: '/v1/edits',

  /** List models; `/v1/models/{id}` for one model */
  models: '/v1/models',

  /** Content moderation */
  moderations: '/v1/moderations',

  /** Text to speech */
  audioSpeech: '/v1/audio/speech',

  /** Speech to text */
  audioTranscriptions: '/v1/audio/transcriptions',

  /** Speech to English text */
  audioTranslations: '/v1/audio/translations',

  /** Image generation */
  images: '/v1/images/generations',

  /** Image edits (multipart) */
  imageEdits: '/v1/images/edits',

  /** Image variations (multipart) */
  imageVariations: '/v1/images/variations',
};

/** Streaming terminator sent as the last `data:` line */
export const STREAM_TERMINATOR = '[DONE]';

/** Prefix of every event line that carries a payload */
export const STREAM_EVENT_PREFIX = 'data:';
