/**
 * RegistryError: structured error hierarchy for the schema registry.
 *
 * Every failure of a registry operation is one of the subclasses below.
 * Each carries a stable `code`, an HTTP-style `status`, and a `body` naming
 * the parameter or rule that caused it, so the transport layer can map it
 * without inspecting messages. Callers match with `instanceof`.
 *
 * A duplicate registration is not an error: it resolves to the existing
 * identity with `created: false`.
 */
import type { ErrorResponse } from './types.js';
import type { CompatibilityMode } from './types/registry.js';

/**
 * Extended error body that may include additional diagnostic fields
 * beyond the base ErrorResponse (e.g., violation lists).
 */
export type RegistryErrorBody = ErrorResponse & Record<string, unknown>;

/** Statuses a registry failure maps to. */
export type RegistryErrorStatus = 404 | 409 | 422 | 500;

export class RegistryError extends Error {
  /**
   * HTTP status code for the error response.
   */
  readonly status: RegistryErrorStatus;

  /**
   * Structured response body matching the ErrorResponse shape,
   * potentially with additional diagnostic fields.
   */
  readonly body: RegistryErrorBody;

  constructor(status: RegistryErrorStatus, body: RegistryErrorBody) {
    super(body.message);
    this.name = 'RegistryError';
    this.status = status;
    this.body = body;

    // Ensure prototype chain is correct for instanceof checks
    // (required when extending built-in classes in TypeScript)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Stable machine-readable error code. */
  get code(): string {
    return this.body.error;
  }

  /**
   * Produce a human-readable string representation for logging.
   */
  override toString(): string {
    return `${this.name}(${this.status}) ${this.body.error}: ${this.body.message}`;
  }

  /**
   * Type guard: check if an unknown error is a RegistryError.
   */
  static isRegistryError(err: unknown): err is RegistryError {
    return err instanceof RegistryError;
  }
}

/** Malformed subject, type, version, id or request body. */
export class InvalidArgumentError extends RegistryError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(422, { error: 'invalid_argument', message, parameter });
    this.name = 'InvalidArgumentError';
    this.parameter = parameter;
  }
}

/** Schema text failed canonicalization. */
export class SchemaParseError extends RegistryError {
  /** Location of the offending node, e.g. `$.fields[1].type`. */
  readonly path: string;
  readonly diagnostic: string;

  constructor(diagnostic: string, path = '$') {
    super(422, {
      error: 'schema_parse_error',
      message: `Invalid schema at ${path}: ${diagnostic}`,
      path,
      diagnostic,
    });
    this.name = 'SchemaParseError';
    this.path = path;
    this.diagnostic = diagnostic;
  }
}

/** One rule the candidate schema broke against one reference version. */
export interface CompatibilityViolation {
  readonly rule:
    | 'READER_FIELD_MISSING_DEFAULT_VALUE'
    | 'WRITER_FIELD_DROPPED_WITHOUT_DEFAULT'
    | 'TYPE_MISMATCH'
    | 'NAME_MISMATCH'
    | 'MISSING_ENUM_SYMBOLS'
    | 'FIXED_SIZE_MISMATCH'
    | 'MISSING_UNION_BRANCH';
  /** Schema path inside the reader, e.g. `$.address.zip`. */
  readonly path: string;
  /** `backward`: new schema reads old data; `forward`: old schema reads new data. */
  readonly direction: 'backward' | 'forward';
  /** Version the candidate was checked against, when known. */
  readonly version?: number;
  readonly message: string;
}

/** Candidate schema violates the effective compatibility mode. */
export class CompatibilityError extends RegistryError {
  readonly subject: string;
  readonly mode: CompatibilityMode;
  readonly violations: readonly CompatibilityViolation[];

  constructor(subject: string, mode: CompatibilityMode, violations: readonly CompatibilityViolation[]) {
    const first = violations[0];
    const summary = first ? `${first.rule} at ${first.path}: ${first.message}` : 'incompatible';
    super(409, {
      error: 'incompatible_schema',
      message: `Schema is incompatible with subject '${subject}' under ${mode}: ${summary}`,
      subject,
      mode,
      violations: violations.map((v) => ({ ...v })),
    });
    this.name = 'CompatibilityError';
    this.subject = subject;
    this.mode = mode;
    this.violations = violations;
  }
}

/** Subject has no live versions. */
export class SubjectNotFoundError extends RegistryError {
  readonly subject: string;

  constructor(subject: string) {
    super(404, { error: 'subject_not_found', message: `Subject not found: ${subject}`, subject });
    this.name = 'SubjectNotFoundError';
    this.subject = subject;
  }
}

/** Requested version is absent or soft-deleted. */
export class VersionNotFoundError extends RegistryError {
  readonly subject: string;
  readonly version: number | 'latest';

  constructor(subject: string, version: number | 'latest') {
    super(404, {
      error: 'version_not_found',
      message: `Version ${version} not found for subject ${subject}`,
      subject,
      version,
    });
    this.name = 'VersionNotFoundError';
    this.subject = subject;
    this.version = version;
  }
}

/** No schema with the given global id. */
export class SchemaIdNotFoundError extends RegistryError {
  readonly schemaId: number;

  constructor(schemaId: number) {
    super(404, { error: 'schema_id_not_found', message: `Schema id not found: ${schemaId}`, schema_id: schemaId });
    this.name = 'SchemaIdNotFoundError';
    this.schemaId = schemaId;
  }
}

/** Schema is valid but not registered under the subject. */
export class SchemaNotFoundError extends RegistryError {
  readonly subject: string;

  constructor(subject: string) {
    super(404, {
      error: 'schema_not_found',
      message: `Schema not registered under subject ${subject}`,
      subject,
    });
    this.name = 'SchemaNotFoundError';
    this.subject = subject;
  }
}

/** Compatibility mode string is not one of the recognised values. */
export class InvalidModeError extends RegistryError {
  readonly mode: string;

  constructor(mode: string, allowed: readonly string[]) {
    super(422, {
      error: 'invalid_compatibility_mode',
      message: `Invalid compatibility mode '${mode}'. Allowed: ${allowed.join(', ')}`,
      mode,
    });
    this.name = 'InvalidModeError';
    this.mode = mode;
  }
}

/** Store corruption or broken invariant. Never retried by the core. */
export class InternalRegistryError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super(500, { error: 'internal_error', message });
    this.name = 'InternalRegistryError';
    if (cause !== undefined) this.cause = cause;
  }
}

