/**
 * Error taxonomy for the terminology engine.
 *
 * None of these reach a caller of the public API: the resolver turns them into
 * fallback terms, extractors turn them into skipped entries, and the pipeline
 * turns them into omitted sections.
 */

export type EngineErrorKind =
  | "UnsupportedCodeSystem"
  | "ConceptNotFound"
  | "MalformedSourceElement"
  | "ExtractorFailure"
  | "CacheBackendUnavailable"
  | "LookupTimeout"
  | "DocumentParse";

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedCodeSystemError extends EngineError {
  readonly kind = "UnsupportedCodeSystem";

  constructor(readonly code: string, readonly codeSystemOid: string) {
    super(`Code system ${codeSystemOid} is not registered (code ${code})`);
  }
}

export class ConceptNotFoundError extends EngineError {
  readonly kind = "ConceptNotFound";

  constructor(readonly code: string, readonly codeSystemOid: string) {
    super(`No active concept ${code} in code system ${codeSystemOid}`);
  }
}

export class MalformedSourceElementError extends EngineError {
  readonly kind = "MalformedSourceElement";

  constructor(readonly field: string, readonly elementId: string | null, detail?: string) {
    super(`Source element ${elementId ?? "(no id)"} is missing ${field}${detail ? `: ${detail}` : ""}`);
  }
}

export class ExtractorFailureError extends EngineError {
  readonly kind = "ExtractorFailure";

  constructor(readonly sectionId: string, cause: unknown) {
    super(`Extractor for section ${sectionId} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class CacheBackendUnavailableError extends EngineError {
  readonly kind = "CacheBackendUnavailable";

  constructor(readonly operation: "get" | "set", cause: unknown) {
    super(`Terminology cache ${operation} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class LookupTimeoutError extends EngineError {
  readonly kind = "LookupTimeout";

  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`Catalogue lookup ${operation} exceeded ${timeoutMs}ms`);
  }
}

export class DocumentParseError extends EngineError {
  readonly kind = "DocumentParse";

  constructor(readonly sourceType: string, detail: string, cause?: unknown) {
    super(`Unable to read ${sourceType} document: ${detail}`, { cause });
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
