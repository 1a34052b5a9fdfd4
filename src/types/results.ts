import { z } from 'zod';

// ============================================================================
// Shared
// ============================================================================

export const UsageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number().optional(),
  total_tokens: z.number(),
});

export type Usage = z.infer<typeof UsageSchema>;

export const ChatRoleSchema = z.enum(['system', 'user', 'assistant', 'tool', 'function']);

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

export type ToolCall = z.infer<typeof ToolCallSchema>;

// ============================================================================
// Completions
// ============================================================================

export const CompletionsResultSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number(),
  model: z.string(),
  choices: z.array(z.object({
    text: z.string(),
    index: z.number(),
    finish_reason: z.string().nullish(),
  })),
  usage: UsageSchema.nullish(),
});

export type CompletionsResult = z.infer<typeof CompletionsResultSchema>;

// ============================================================================
// Chat
// ============================================================================

export const ChatResultSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number(),
  model: z.string(),
  choices: z.array(z.object({
    index: z.number(),
    message: z.object({
      role: ChatRoleSchema,
      content: z.string().nullish(),
      name: z.string().optional(),
      tool_calls: z.array(ToolCallSchema).optional(),
    }),
    finish_reason: z.string().nullish(),
  })),
  usage: UsageSchema.nullish(),
  system_fingerprint: z.string().nullish(),
});

export type ChatResult = z.infer<typeof ChatResultSchema>;

/**
 * One incremental event of a streamed chat completion
 */
export const ChatStreamResultSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number(),
  model: z.string(),
  choices: z.array(z.object({
    index: z.number(),
    delta: z.object({
      role: ChatRoleSchema.optional(),
      content: z.string().nullish(),
      tool_calls: z.array(z.object({
        index: z.number(),
        id: z.string().optional(),
        type: z.literal('function').optional(),
        function: z.object({
          name: z.string().optional(),
          arguments: z.string().optional(),
        }).optional(),
      })).optional(),
    }),
    finish_reason: z.string().nullish(),
  })),
  usage: UsageSchema.nullish(),
  system_fingerprint: z.string().nullish(),
});

export type ChatStreamResult = z.infer<typeof ChatStreamResultSchema>;

// ============================================================================
// Edits
// ============================================================================

export const EditsResultSchema = z.object({
  object: z.string(),
  created: z.number(),
  choices: z.array(z.object({
    text: z.string(),
    index: z.number(),
  })),
  usage: UsageSchema,
});

export type EditsResult = z.infer<typeof EditsResultSchema>;

// ============================================================================
// Embeddings
// ============================================================================

export const EmbeddingsResultSchema = z.object({
  object: z.string(),
  model: z.string(),
  data: z.array(z.object({
    object: z.string(),
    embedding: z.array(z.number()),
    index: z.number(),
  })),
  usage: z.object({
    prompt_tokens: z.number(),
    total_tokens: z.number(),
  }),
});

export type EmbeddingsResult = z.infer<typeof EmbeddingsResultSchema>;

// ============================================================================
// Images
// ============================================================================

export const ImagesResultSchema = z.object({
  created: z.number(),
  data: z.array(z.object({
    url: z.string().optional(),
    b64_json: z.string().optional(),
    revised_prompt: z.string().optional(),
  })),
});

export type ImagesResult = z.infer<typeof ImagesResultSchema>;

// ============================================================================
// Models
// ============================================================================

export const ModelResultSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number().optional(),
  owned_by: z.string(),
});

export type ModelResult = z.infer<typeof ModelResultSchema>;

export const ModelsResultSchema = z.object({
  object: z.string(),
  data: z.array(ModelResultSchema),
});

export type ModelsResult = z.infer<typeof ModelsResultSchema>;

// ============================================================================
// Moderations
// ============================================================================

export const ModerationsResultSchema = z.object({
  id: z.string(),
  model: z.string(),
  results: z.array(z.object({
    flagged: z.boolean(),
    categories: z.record(z.string(), z.boolean()),
    category_scores: z.record(z.string(), z.number()),
  })),
});

export type ModerationsResult = z.infer<typeof ModerationsResultSchema>;

// ============================================================================
// Audio
// ============================================================================

export const AudioTranscriptionResultSchema = z.object({
  text: z.string(),
});

export type AudioTranscriptionResult = z.infer<typeof AudioTranscriptionResultSchema>;

export const AudioTranslationResultSchema = z.object({
  text: z.string(),
});

export type AudioTranslationResult = z.infer<typeof AudioTranslationResultSchema>;

/** Raw audio bytes in the format the request asked for */
export interface AudioSpeechResult {
  audio: Buffer;
}

// ============================================================================
// Errors
// ============================================================================

export const APIErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().nullish(),
    param: z.string().nullish(),
    code: z.union([z.string(), z.number()]).nullish().transform((code) => code === undefined || code === null ? code : String(code)),
  }),
});

export type APIErrorResponse = z.infer<typeof APIErrorResponseSchema>;
