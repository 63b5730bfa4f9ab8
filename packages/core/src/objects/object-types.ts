/**
 * Immutable, content-addressed objects
 *
 * Every object carries a `type` tag. Objects are declared as type aliases
 * (not interfaces) so they stay assignable to CanonicalValue for hashing.
 */

import type { BlobRef, ObjectId } from "../common/id/index.js";

/**
 * Page content as seen by callers.
 */
export type Page = {
  /** Reference to the page image */
  image: BlobRef;
  /** Reference to the page thumbnail */
  thumbnail: BlobRef;
  /** Display label (e.g. "1", "ii", "3a") */
  number: string;
};

/**
 * Score property record. Absent fields are omitted, never null.
 */
export type ScoreProperty = {
  title?: string;
  description?: string;
};

export type PageObject = Page & {
  type: "page";
};

/**
 * Ordered page list of a score at one point in history.
 * The order of `pages` is part of the hash; duplicates are allowed.
 */
export type SnapshotObject = {
  type: "snapshot";
  /** Previous snapshot, or null for the root of a score */
  parent: ObjectId | null;
  pages: ObjectId[];
};

export type PropertyObject = ScoreProperty & {
  type: "property";
  /** Previous property record, or null for the root of a score */
  parent: ObjectId | null;
};

/**
 * Any object kept in the object store.
 */
export type ScoreObject = PageObject | SnapshotObject | PropertyObject;

export type ScoreObjectType = ScoreObject["type"];

export function isPageObject(object: ScoreObject): object is PageObject {
  return object.type === "page";
}

export function isSnapshotObject(object: ScoreObject): object is SnapshotObject {
  return object.type === "snapshot";
}

export function isPropertyObject(object: ScoreObject): object is PropertyObject {
  return object.type === "property";
}

/**
 * Build a page object, dropping any extra fields the input carries.
 */
export function createPageObject(page: Page): PageObject {
  return { type: "page", image: page.image, thumbnail: page.thumbnail, number: page.number };
}

/**
 * Build a property object. Undefined fields are left out so two records
 * with the same visible content hash identically.
 */
export function createPropertyObject(
  property: ScoreProperty,
  parent: ObjectId | null,
): PropertyObject {
  const object: PropertyObject = { type: "property", parent };
  if (property.title !== undefined) object.title = property.title;
  if (property.description !== undefined) object.description = property.description;
  return object;
}

/**
 * Strip the storage fields from a property object.
 */
export function toScoreProperty(object: PropertyObject): ScoreProperty {
  const property: ScoreProperty = {};
  if (object.title !== undefined) property.title = object.title;
  if (object.description !== undefined) property.description = object.description;
  return property;
}

/**
 * Strip the storage fields from a page object.
 */
export function toPage(object: PageObject): Page {
  return { image: object.image, thumbnail: object.thumbnail, number: object.number };
}
