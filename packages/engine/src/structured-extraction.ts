/**
 * Structured extraction adapter.
 *
 * Wraps one unreliable generator call whose text output must conform to
 * a fixed schema. The adapter owns the attempt loop: rate-limited failures
 * back off, schema violations get one pass of a deterministic fallback
 * extractor before the attempt counts as failed, and an exhausted budget
 * yields a schema-valid placeholder plus one GenerationError entry. No
 * failure of the wrapped call escapes `extract`.
 */

import type { ScoreScale } from "@tribunal/config";
import type { Semaphore } from "./concurrency.js";
import { GenerationError, errorMessage, formatErrorEntry } from "./errors.js";
import { emitStructuredLog, engineTelemetry } from "./observability.js";
import type { RetryPolicy } from "./retry-policy.js";

/* ------------------------------------------------------------------ */
/*  Parsing                                                            */
/* ------------------------------------------------------------------ */

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function isStringArray(input: unknown): input is string[] {
  return Array.isArray(input) && input.every((item) => typeof item === "string");
}

function hasOnlyKeys(input: Record<string, unknown>, keys: string[]): boolean {
  const valid = new Set(keys);
  return Object.keys(input).every((key) => valid.has(key));
}

export function parseStructuredOutput<T>(raw: string, validator: (input: unknown) => input is T, label: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new GenerationError(`Invalid ${label} response: expected JSON object.`);
  }
  if (!validator(parsed)) {
    throw new GenerationError(`Invalid ${label} response: schema validation failed.`);
  }
  return parsed;
}

/* ------------------------------------------------------------------ */
/*  Schemas                                                            */
/* ------------------------------------------------------------------ */

export interface ExtractionSchema<T> {
  label: string;
  validate: (input: unknown) => input is T;
  /** Deterministic scan of non-conforming raw text; `undefined` when nothing usable is found. */
  fallback: (raw: string) => T | undefined;
  /** Schema-valid stand-in used once the attempt budget is spent. */
  placeholder: (reason: string) => T;
}

/** Payload a reviewer role returns for one criterion. */
export interface OpinionPayload {
  score: number;
  rationale: string;
  citations: string[];
}

export const DEGRADED_RATIONALE_PREFIX = "[DEGRADED]";

function isScoreInScale(value: unknown, scale: ScoreScale): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= scale.min && value <= scale.max;
}

/** Whole numbers only: "3.5" and "12" are not taken as a 3 or a 1; "4." is a 4. */
const INTEGER_TOKEN = /(?<!\d|\d\.)-?\d+(?!\d|\.\d)/g;

export function opinionPayloadSchema(scale: ScoreScale): ExtractionSchema<OpinionPayload> {
  const validate = (input: unknown): input is OpinionPayload =>
    isRecord(input) &&
    hasOnlyKeys(input, ["score", "rationale", "citations"]) &&
    isScoreInScale(input.score, scale) &&
    typeof input.rationale === "string" &&
    input.rationale.trim().length > 0 &&
    isStringArray(input.citations);

  return {
    label: "opinion",
    validate,
    fallback: (raw) => {
      const start = raw.indexOf("{");
      const end = raw.lastIndexOf("}");
      if (start !== -1 && end > start) {
        try {
          const embedded: unknown = JSON.parse(raw.slice(start, end + 1));
          if (validate(embedded)) return embedded;
        } catch (err) {
          emitStructuredLog("engine", "debug", "embedded JSON did not parse", { error: errorMessage(err) });
        }
      }
      const rationale = raw.trim();
      for (const match of raw.matchAll(INTEGER_TOKEN)) {
        const score = Number(match[0]);
        if (isScoreInScale(score, scale)) {
          return { score, rationale, citations: [] };
        }
      }
      return undefined;
    },
    placeholder: (reason) => ({
      score: Math.floor((scale.min + scale.max) / 2),
      rationale: `${DEGRADED_RATIONALE_PREFIX} ${reason}`,
      citations: [],
    }),
  };
}

/* ------------------------------------------------------------------ */
/*  Adapter                                                            */
/* ------------------------------------------------------------------ */

export interface ExtractionResult<T> {
  value: T;
  degraded: boolean;
  attempts: number;
  /** Error list entries to merge; at most one. */
  errors: string[];
}

export interface ExtractRequest<T> {
  /** Prefix of the GenerationError entry, usually `<node>/<criterion>`. */
  sourceId: string;
  schema: ExtractionSchema<T>;
  call: (signal?: AbortSignal) => Promise<string>;
  signal?: AbortSignal;
}

export interface StructuredExtractionAdapterOptions {
  retry: RetryPolicy;
  /** External-call limiter shared by every adapter of a run. */
  limiter: Semaphore;
}

export class StructuredExtractionAdapter {
  private readonly retry: RetryPolicy;
  private readonly limiter: Semaphore;

  constructor(options: StructuredExtractionAdapterOptions) {
    this.retry = options.retry;
    this.limiter = options.limiter;
  }

  async extract<T>(request: ExtractRequest<T>): Promise<ExtractionResult<T>> {
    const { schema, sourceId, signal } = request;
    let attempts = 0;

    const attempt = async (): Promise<{ value: T; fellBack: boolean }> => {
      attempts += 1;
      engineTelemetry.generatorAttemptsTotal.add(1, { schema: schema.label });
      const raw = await this.limiter.run(() => request.call(signal));
      try {
        return { value: parseStructuredOutput(raw, schema.validate, schema.label), fellBack: false };
      } catch (err) {
        const recovered = schema.fallback(raw);
        if (recovered === undefined) throw err;
        return { value: recovered, fellBack: true };
      }
    };

    try {
      const { value, fellBack } = await this.retry.run(
        attempt,
        (state) => {
          if (state.error) {
            emitStructuredLog("engine", "warn", "generator attempt failed", {
              source: sourceId,
              attempt: state.attempt,
              failureClass: state.failureClass,
              delayMs: state.delayMs,
              error: state.error,
            });
          }
        },
        signal,
      );
      if (fellBack) {
        emitStructuredLog("engine", "info", "fallback extractor recovered payload", { source: sourceId, attempts });
      }
      return { value, degraded: false, attempts, errors: [] };
    } catch (err) {
      const failure = new GenerationError(
        `no schema-conformant ${schema.label} after ${attempts} attempt(s): ${errorMessage(err)}`,
      );
      engineTelemetry.degradedOpinionsTotal.add(1, { schema: schema.label });
      emitStructuredLog("engine", "error", "extraction degraded to placeholder", { source: sourceId, attempts });
      return {
        value: schema.placeholder(failure.message),
        degraded: true,
        attempts,
        errors: [formatErrorEntry(sourceId, failure)],
      };
    }
  }
}
