/**
 * Request bodies, named as they travel on the wire.
 */

export type Model = string;

/**
 * A file uploaded as one part of a multipart request
 */
export interface UploadFile {
  data: Uint8Array;
  fileName: string;
  contentType?: string;
}

export interface CompletionsQuery {
  model: Model;
  prompt?: string | string[];
  suffix?: string;
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  n?: number;
  logprobs?: number;
  echo?: boolean;
  stop?: string | string[];
  presence_penalty?: number;
  frequency_penalty?: number;
  best_of?: number;
  logit_bias?: Record<string, number>;
  seed?: number;
  user?: string;
  stream?: boolean;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  name?: string;
  tool_call_id?: string;
  tool_calls?: Array<{
    id: string;
    type: 'function';
    function: { name: string; arguments: string };
  }>;
}

export interface ChatFunctionTool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: Record<string, unknown>;
  };
}

export interface ChatQuery {
  model: Model;
  messages: ChatMessage[];
  tools?: ChatFunctionTool[];
  tool_choice?: 'none' | 'auto' | 'required' | { type: 'function'; function: { name: string } };
  temperature?: number;
  top_p?: number;
  n?: number;
  stop?: string | string[];
  max_tokens?: number;
  presence_penalty?: number;
  frequency_penalty?: number;
  logit_bias?: Record<string, number>;
  response_format?: { type: 'text' | 'json_object' };
  seed?: number;
  user?: string;
  stream?: boolean;
  stream_options?: { include_usage?: boolean };
}

export interface EditsQuery {
  model: Model;
  input?: string;
  instruction: string;
  n?: number;
  temperature?: number;
  top_p?: number;
}

export interface EmbeddingsQuery {
  model: Model;
  input: string | string[] | number[] | number[][];
  encoding_format?: 'float' | 'base64';
  dimensions?: number;
  user?: string;
}

export type ImageSize = '256x256' | '512x512' | '1024x1024' | '1792x1024' | '1024x1792';
export type ImageResponseFormat = 'url' | 'b64_json';

export interface ImagesQuery {
  prompt: string;
  model?: Model;
  n?: number;
  quality?: 'standard' | 'hd';
  response_format?: ImageResponseFormat;
  size?: ImageSize;
  style?: 'vivid' | 'natural';
  user?: string;
}

export interface ImageEditsQuery {
  image: UploadFile;
  prompt: string;
  mask?: UploadFile;
  model?: Model;
  n?: number;
  response_format?: ImageResponseFormat;
  size?: ImageSize;
  user?: string;
}

export interface ImageVariationsQuery {
  image: UploadFile;
  model?: Model;
  n?: number;
  response_format?: ImageResponseFormat;
  size?: ImageSize;
  user?: string;
}

export interface ModerationsQuery {
  input: string | string[];
  model?: Model;
}

export interface AudioTranscriptionQuery {
  file: UploadFile;
  model: Model;
  prompt?: string;
  response_format?: 'json' | 'verbose_json';
  temperature?: number;
  language?: string;
}

export interface AudioTranslationQuery {
  file: UploadFile;
  model: Model;
  prompt?: string;
  response_format?: 'json' | 'verbose_json';
  temperature?: number;
}

export interface AudioSpeechQuery {
  model: Model;
  input: string;
  voice: 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';
  response_format?: 'mp3' | 'opus' | 'aac' | 'flac' | 'wav' | 'pcm';
  speed?: number;
}

export interface ModelQuery {
  model: Model;
}

/**
 * Form fields of a multipart request
 */
export type MultipartFieldValue =
  | UploadFile
  | string
  | number
  | boolean
  | undefined
  | ReadonlyArray<string | number>;

export type MultipartFields = Readonly<Record<string, MultipartFieldValue>>;
