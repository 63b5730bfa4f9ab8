/**
 * Object hash functions
 *
 * Content hashes are SHA-256 digests of the canonical JSON form of an
 * object (sorted keys, undefined fields omitted). Two objects with the same
 * logical content always get the same id, whichever code path built them.
 */

import { canonicalJson, sha256Hex } from "@score-history/utils";

import type { ObjectId } from "../id/index.js";
import type { ScoreObject } from "../../objects/object-types.js";

/**
 * Canonical serialized form of an object, as fed to the hash.
 */
export function encodeObject(object: ScoreObject): string {
  return canonicalJson(object);
}

/**
 * Compute the content hash of an object.
 *
 * @returns 64-character lowercase hex object ID
 */
export async function computeObjectHash(object: ScoreObject): Promise<ObjectId> {
  return sha256Hex(encodeObject(object));
}
