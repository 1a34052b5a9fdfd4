/**
 * Payload builders shared by the stream and client tests.
 */

export function chatChunk(id: string, content: string | null, finishReason: string | null = null): Record<string, unknown> {
  return {
    id,
    object: "chat.completion.chunk",
    created: 1700000000,
    model: "test-model",
    choices: [{ index: 0, delta: { content }, finish_reason: finishReason }],
  };
}

export function completionChunk(id: string, text: string): Record<string, unknown> {
  return {
    id,
    object: "text_completion",
    created: 1700000000,
    model: "test-model",
    choices: [{ text, index: 0, finish_reason: null }],
  };
}

export function chatCompletion(content: string): Record<string, unknown> {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1700000000,
    model: "test-model",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
    usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
  };
}

export function apiErrorBody(message: string, code: string | number | null = null): Record<string, unknown> {
  return { error: { message, type: "invalid_request_error", param: null, code } };
}

/**
 * Split `text` into chunks of at most `size` bytes, cutting through
 * multi-byte characters where they fall.
 */
export function splitBytes(text: string, size: number): Buffer[] {
  const bytes = Buffer.from(text, "utf8");
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < bytes.length; offset += size) {
    chunks.push(bytes.subarray(offset, offset + size));
  }
  return chunks;
}

/**
 * Deterministic pseudo-random sequence in [0, 1)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
