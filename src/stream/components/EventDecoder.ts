/**
 * EventDecoder - Payload Decoding Component
 *
 * Decodes one event payload into the result type of the call in flight.
 * Decoding is all-or-nothing: a payload either matches the schema, or is a
 * structured API error, or is reported as a DecodeError. A failure here is
 * a value, never a throw, so the stream can carry on.
 */

import { APIError, DecodeError } from "../../errors.js";
import { APIErrorResponseSchema } from "../../types/results.js";
import { failure, success, type Result } from "../../utils/result.js";

import type { ZodType, ZodTypeDef } from "zod";

export type PayloadSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export class EventDecoder<T> {
  constructor(private readonly schema: PayloadSchema<T>) {}

  decode(payload: string): Result<T, APIError | DecodeError> {
    let json: unknown;
    try {
      json = JSON.parse(payload);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : "Unknown error";
      return failure(new DecodeError(`Malformed JSON payload: ${reason}`, payload, error));
    }

    const parsed = this.schema.safeParse(json);
    if (parsed.success) {
      return success(parsed.data);
    }

    const apiError = APIErrorResponseSchema.safeParse(json);
    if (apiError.success) {
      return failure(new APIError(apiError.data));
    }

    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return failure(new DecodeError(
      `Payload does not match the expected schema${where}: ${issue?.message ?? parsed.error.message}`,
      payload,
      parsed.error,
    ));
  }
}
