/**
 * Error taxonomy of an audit run.
 *
 * Run-time failures never escape a node: they are flattened into error
 * list entries of the form `"<source-id>: <ErrorName>: <message>"`.
 * Only ConfigurationError (at graph construction), RunTimeout and
 * RunCancelled are run-fatal.
 */

export class AuditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A collector could not reach or parse its source. */
export class CollectionError extends AuditError {}

/** The generator never produced a schema-conformant payload within budget. */
export class GenerationError extends AuditError {}

/** A set-once field was targeted twice with differing values. */
export class MergeConflict extends AuditError {}

/** The graph definition is incomplete or inconsistent. */
export class ConfigurationError extends AuditError {}

/** A node did not finish within its per-node timeout. */
export class NodeTimeout extends AuditError {}

/** A node returned something that is not a state delta. */
export class MalformedDelta extends AuditError {}

/** The global run deadline passed before the graph reached a terminal stage. */
export class RunTimeout extends AuditError {}

/** The caller aborted the run before it reached a terminal stage. */
export class RunCancelled extends AuditError {}

/** The generator endpoint asked the caller to slow down. */
export class RateLimitError extends AuditError {
  constructor(
    message: string,
    readonly retryAfterMs?: number,
  ) {
    super(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Render a failure as one error list entry. */
export function formatErrorEntry(sourceId: string, err: unknown): string {
  if (err instanceof Error && err.name !== "Error") {
    return `${sourceId}: ${err.name}: ${err.message}`;
  }
  return `${sourceId}: ${errorMessage(err)}`;
}
