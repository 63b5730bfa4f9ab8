/**
 * Object serialization
 *
 * Backends persist objects as their canonical JSON text. Decoding
 * validates the shape so a damaged record surfaces as an error here
 * rather than as a malformed page further down.
 */

import { z } from "zod";

import { encodeObject } from "../common/hash/object-hash.js";
import type { ScoreObject } from "./object-types.js";

const objectIdSchema = z.string().min(1);

const pageObjectSchema = z
  .object({
    type: z.literal("page"),
    image: z.string(),
    thumbnail: z.string(),
    number: z.string(),
  })
  .strict();

const snapshotObjectSchema = z
  .object({
    type: z.literal("snapshot"),
    parent: objectIdSchema.nullable(),
    pages: z.array(objectIdSchema),
  })
  .strict();

const propertyObjectSchema = z
  .object({
    type: z.literal("property"),
    parent: objectIdSchema.nullable(),
    title: z.string().optional(),
    description: z.string().optional(),
  })
  .strict();

export const scoreObjectSchema = z.discriminatedUnion("type", [
  pageObjectSchema,
  snapshotObjectSchema,
  propertyObjectSchema,
]);

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Serialize an object to canonical JSON text.
 */
export function serializeObject(object: ScoreObject): string {
  return encodeObject(object);
}

/**
 * Parse and validate a stored object.
 *
 * @throws Error if the text is not a valid object record
 */
export function deserializeObject(text: string): ScoreObject {
  const result = scoreObjectSchema.safeParse(JSON.parse(text));
  if (!result.success) {
    throw new Error(`Malformed stored object: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Binary variants for byte-oriented backends (key-value stores).
 */
export function serializeObjectBytes(object: ScoreObject): Uint8Array {
  return encoder.encode(serializeObject(object));
}

export function deserializeObjectBytes(data: Uint8Array): ScoreObject {
  return deserializeObject(decoder.decode(data));
}
