/**
 * Catalog error taxonomy.
 *
 * ParseError is an operator-facing load failure; MissingKeyError and
 * MissingArgumentError are per-call resolution failures handed to the caller.
 */
export type CatalogErrorCode = "PARSE_ERROR" | "MISSING_KEY" | "MISSING_ARGUMENT";

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ParseError extends CatalogError {
  readonly tableId: string;
  readonly line: number;
  readonly key: string | undefined;
  readonly reason: string;

  constructor(tableId: string, line: number, reason: string, key?: string) {
    const where = key ? `${tableId}:${line} (${key})` : `${tableId}:${line}`;
    super("PARSE_ERROR", `${where}: ${reason}`);
    this.tableId = tableId;
    this.line = line;
    this.key = key;
    this.reason = reason;
  }
}

export class MissingKeyError extends CatalogError {
  readonly locale: string;
  readonly key: string;
  /** Table ids consulted, in fallback order. */
  readonly searched: readonly string[];

  constructor(locale: string, key: string, searched: readonly string[]) {
    super("MISSING_KEY", `message "${key}" not found for ${locale} (searched ${searched.join(" > ") || "nothing"})`);
    this.locale = locale;
    this.key = key;
    this.searched = searched;
  }
}

export class MissingArgumentError extends CatalogError {
  readonly key: string;
  readonly placeholder: string;
  readonly locale: string;

  constructor(locale: string, key: string, placeholder: string) {
    super("MISSING_ARGUMENT", `message "${key}" (${locale}) needs argument "${placeholder}"`);
    this.locale = locale;
    this.key = key;
    this.placeholder = placeholder;
  }
}

export type ResolutionError = MissingKeyError | MissingArgumentError;

export type IssueKind = "missing-key" | "extra-key" | "placeholder-mismatch" | "unknown-reference";

/**
 * Key-set drift between a table and its reference. Always a warning:
 * partially translated locales keep serving.
 */
export interface ValidationIssue {
  severity: "warning";
  kind: IssueKind;
  tableId: string;
  referenceId: string;
  key?: string;
  message: string;
}

export type Result<T, E> = { data: T } | { error: E };

export function isCatalogError(value: unknown): value is CatalogError {
  return value instanceof CatalogError;
}
