import type { Logger } from 'pino';
import { BackendFailure, MemoryToolError, type ErrorKind } from './errors.js';

// ── Wire constants ─────────────────────────────────────────────────
// Clients key into these, so they are part of the tool contract.

/** Envelope key for sequence-shaped returns. */
export const RESULTS_KEY = 'results';

/** Envelope key for scalar, null and undefined returns. */
export const RESULT_KEY = 'result';

export type JsonObject = { [key: string]: unknown };

export type MemoryValue =
  | { shape: 'sequence'; items: readonly unknown[] }
  | { shape: 'mapping'; value: JsonObject }
  | { shape: 'scalar'; value: unknown };

export interface ErrorPayload {
  [key: string]: unknown;
  error: {
    kind: ErrorKind;
    message: string;
  };
}

// One JSON text block; isError marks an error envelope.
export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

// ── Normalization ──────────────────────────────────────────────────

function isMapping(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function classify(value: unknown): MemoryValue {
  if (Array.isArray(value)) return { shape: 'sequence', items: value };
  if (isMapping(value)) return { shape: 'mapping', value };
  return { shape: 'scalar', value };
}

/**
 * Shapes a backend return value into the object that is sent to the
 * client. The top-level JSON value is always an object.
 */
export function normalizeResponse(value: unknown): JsonObject {
  const classified = classify(value);
  switch (classified.shape) {
    case 'sequence':
      return { [RESULTS_KEY]: classified.items };
    case 'mapping':
      return classified.value;
    case 'scalar':
      return { [RESULT_KEY]: classified.value ?? null };
  }
}

// ── Tool result helpers ────────────────────────────────────────────

function encode(data: JsonObject): string {
  return JSON.stringify(data, null, 2);
}

export function success(data: JsonObject): ToolResult {
  return { content: [{ type: 'text', text: encode(data) }] };
}

export function failure(payload: ErrorPayload): ToolResult {
  return { content: [{ type: 'text', text: encode(payload) }], isError: true };
}

export function toErrorPayload(operation: string, err: unknown): ErrorPayload {
  if (err instanceof MemoryToolError) {
    return { error: { kind: err.kind, message: err.message } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { error: { kind: 'BackendFailure', message: `${operation} failed: ${message}` } };
}

function report(operation: string, err: unknown, logger: Logger): ToolResult {
  const payload = toErrorPayload(operation, err);
  if (payload.error.kind === 'BackendFailure') {
    logger.error({ err, operation }, 'memory call failed');
  } else {
    logger.warn({ operation, kind: payload.error.kind }, payload.error.message);
  }
  return failure(payload);
}

// ── Call wrapper ───────────────────────────────────────────────────

/**
 * Runs one memory operation and returns its result as a single JSON
 * text block. Failures come back as an error envelope with `isError`
 * set; this function never rejects.
 */
export async function callMemory(
  operation: string,
  invoke: () => Promise<unknown>,
  logger: Logger,
): Promise<ToolResult> {
  let value: unknown;
  try {
    value = await invoke();
  } catch (err) {
    return report(operation, err, logger);
  }

  try {
    return success(normalizeResponse(value));
  } catch (err) {
    logger.error({ err, operation }, 'response encoding failed');
    return failure(
      toErrorPayload(
        operation,
        new BackendFailure(`${operation} returned a value that cannot be encoded as JSON`),
      ),
    );
  }
}
