/**
 * Validation of untyped commit payloads
 *
 * Turns JSON received from a client into the closed operation union.
 * Operation payloads may be flat (`{ type, index, ... }`) or nested under
 * a key named after their type (`{ type: "delete_page", delete_page: { index } }`).
 */

import { isHexDigest } from "@score-history/utils";
import { type ZodError, z } from "zod";

import { HashFormat } from "../common/id/index.js";
import { InvalidOperationError, UnsupportedOperationError } from "../errors/index.js";
import type { ScoreHistoryLogger } from "../logging/index.js";
import {
  type CommitRequest,
  SCORE_OPERATION_TYPES,
  type ScoreOperation,
  type ScoreOperationType,
  type UpdatePropertyRequest,
} from "./commit-types.js";

const blobRefSchema = z.string().min(1);
const indexSchema = z.number().int().nonnegative();
const objectIdSchema = z
  .string()
  .refine((value) => isHexDigest(value, HashFormat.OBJECT_ID_STRING_LENGTH), {
    message: "must be a lowercase hex SHA-256 object id",
  });

const operationSchemas = {
  add_page: z.object({
    type: z.literal("add_page"),
    image: blobRefSchema,
    thumbnail: blobRefSchema,
    number: z.string(),
  }),
  insert_page: z.object({
    type: z.literal("insert_page"),
    index: indexSchema,
    image: blobRefSchema,
    thumbnail: blobRefSchema,
    number: z.string(),
  }),
  delete_page: z.object({
    type: z.literal("delete_page"),
    index: indexSchema,
  }),
  update_property: z.object({
    type: z.literal("update_property"),
    title: z.string().optional(),
    description: z.string().optional(),
  }),
} satisfies Record<ScoreOperationType, z.ZodTypeAny>;

const propertySchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
});

const commitRequestSchema = z.object({
  parent: objectIdSchema,
  operations: z.array(z.unknown()),
  propertyParent: objectIdSchema.optional(),
});

const updatePropertyRequestSchema = z.object({
  parent: objectIdSchema,
  property: propertySchema,
});

export interface ParseOptions {
  /**
   * Reject unknown operation types with UnsupportedOperationError (default).
   * When false they are dropped and reported through the logger.
   */
  strict?: boolean;
  logger?: ScoreHistoryLogger;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isKnownType(type: string): type is ScoreOperationType {
  return SCORE_OPERATION_TYPES.some((known) => known === type);
}

function flatten(type: ScoreOperationType, raw: Record<string, unknown>): Record<string, unknown> {
  const nested = raw[type];
  return isRecord(nested) ? { ...nested, type } : raw;
}

/**
 * Parse a single operation.
 *
 * @returns The typed operation, or undefined when it was dropped in
 * permissive mode
 */
export function parseOperation(
  raw: unknown,
  operationIndex: number,
  options: ParseOptions = {},
): ScoreOperation | undefined {
  const { strict = true, logger } = options;

  if (!isRecord(raw) || typeof raw.type !== "string") {
    throw new InvalidOperationError("operation must be an object with a string 'type'", operationIndex);
  }

  const type = raw.type;
  if (!isKnownType(type)) {
    if (strict) {
      throw new UnsupportedOperationError(type, operationIndex);
    }
    logger?.warn?.(`Dropping unsupported operation #${operationIndex} '${type}'`);
    return undefined;
  }

  const result = operationSchemas[type].safeParse(flatten(type, raw));
  if (!result.success) {
    throw new InvalidOperationError(formatIssues(result.error), operationIndex);
  }
  return result.data;
}

/**
 * Parse an operation list, keeping array order.
 */
export function parseOperations(raw: unknown, options: ParseOptions = {}): ScoreOperation[] {
  if (!Array.isArray(raw)) {
    throw new InvalidOperationError("operations must be an array");
  }
  const operations: ScoreOperation[] = [];
  raw.forEach((item, i) => {
    const operation = parseOperation(item, i, options);
    if (operation) operations.push(operation);
  });
  return operations;
}

/**
 * Parse a commit request (`{ parent, operations, propertyParent? }`).
 */
export function parseCommitRequest(input: unknown, options: ParseOptions = {}): CommitRequest {
  const result = commitRequestSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidOperationError(formatIssues(result.error));
  }
  const { parent, operations, propertyParent } = result.data;
  const request: CommitRequest = { parent, operations: parseOperations(operations, options) };
  if (propertyParent !== undefined) {
    request.propertyParent = propertyParent;
  }
  return request;
}

/**
 * Parse a property update request (`{ parent, property }`).
 */
export function parseUpdatePropertyRequest(input: unknown): UpdatePropertyRequest {
  const result = updatePropertyRequestSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidOperationError(formatIssues(result.error));
  }
  return result.data;
}
