// src/payload.ts
import type { z } from "zod";
import { PayloadError } from "./errors.js";
import type { JsonValue } from "./types.js";

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function encodePayload(body: unknown): string | undefined {
  if (body === undefined) return undefined;
  return JSON.stringify(body);
}

/** UTF-8 JSON; an empty (or whitespace-only) body decodes to `{}`. */
export function decodePayload(body: Uint8Array): JsonValue {
  let text: string;
  try {
    text = utf8.decode(body);
  } catch (err) {
    throw new PayloadError("Response body is not valid UTF-8.", { cause: err });
  }

  if (text.trim() === "") return {};

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new PayloadError("Response body is not valid JSON.", { cause: err });
  }
}

export function validatePayload<T>(schema: PayloadSchema<T>, value: JsonValue): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new PayloadError(`Response failed validation: ${detail}`, { cause: result.error });
  }
  return result.data;
}
