// ---------------------------------------------------------------------------
// Error hierarchy for the audiobook locator.
// ---------------------------------------------------------------------------

import type { SourceName } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all locator domain errors.
 */
export class LocatorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LocatorError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Source errors ───────────────────────────────────────────────────────────

/**
 * Base class for errors originating from an upstream catalog source.
 */
export class SourceError extends LocatorError {
  public readonly source: SourceName;

  constructor(message: string, source: SourceName, options?: ErrorOptions) {
    super(message, options);
    this.name = "SourceError";
    this.source = source;
  }
}

/** Network failure or a non-success HTTP status. */
export class SourceUnavailableError extends SourceError {
  /** HTTP status, or `null` when no response was received. */
  public readonly status: number | null;

  constructor(
    message: string,
    source: SourceName,
    status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, source, options);
    this.name = "SourceUnavailableError";
    this.status = status;
  }
}

/** The call exceeded its deadline. */
export class SourceTimeoutError extends SourceError {
  constructor(message: string, source: SourceName, options?: ErrorOptions) {
    super(message, source, options);
    this.name = "SourceTimeoutError";
  }
}

/** The source answered with a body we could not validate. */
export class SourceParseError extends SourceError {
  constructor(message: string, source: SourceName, options?: ErrorOptions) {
    super(message, source, options);
    this.name = "SourceParseError";
  }
}

// ── Domain errors ───────────────────────────────────────────────────────────

/** The input does not match any known identifier shape. */
export class InvalidIdentifierError extends LocatorError {
  public readonly raw: string;

  constructor(raw: string, reason: string, options?: ErrorOptions) {
    super(`Invalid identifier "${raw}": ${reason}`, options);
    this.name = "InvalidIdentifierError";
    this.raw = raw;
  }
}

/** An ISBN-13 outside the 978 prefix has no ISBN-10 form. */
export class NotConvertibleError extends LocatorError {
  public readonly isbn13: string;

  constructor(isbn13: string, options?: ErrorOptions) {
    super(`ISBN-13 ${isbn13} has no ISBN-10 equivalent`, options);
    this.name = "NotConvertibleError";
    this.isbn13 = isbn13;
  }
}

/** The caller abandoned the search before it finished. */
export class SearchCancelledError extends LocatorError {
  constructor(query: string, options?: ErrorOptions) {
    super(`Search for "${query}" was cancelled`, options);
    this.name = "SearchCancelledError";
  }
}

/**
 * The store handed back a row that no longer exists. Raised by store
 * implementations; never expected to reach a search caller.
 */
export class StaleReferenceError extends LocatorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StaleReferenceError";
  }
}

/** Request parameters failed validation. */
export class RequestValidationError extends LocatorError {
  public readonly issues: string[];

  constructor(issues: string[], options?: ErrorOptions) {
    super(`Invalid request: ${issues.join("; ")}`, options);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends LocatorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
