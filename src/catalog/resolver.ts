/**
 * Catalog resolver
 *
 * Owns every loaded MessageTable for one process (or one reloadable session)
 * and answers (locale, key, arguments) → string.
 *
 * - Tables are immutable once published; load/reload swaps the Map entry for
 *   a table id in one step, so resolve() sees either the old or the new table.
 * - A table id is a locale ("zh-CN") or a layered locale ("shared/zh-CN").
 *   Layers are ordinary fallback entries, not a special case.
 * - Async loads are queued per table id; they never block other ids or reads.
 */
import {
  MissingKeyError,
  ParseError,
  type ResolutionError,
  type Result,
  type ValidationIssue,
} from "./errors";
import { createJoinFormatter, type ArgumentFormatter, type RenderArguments } from "./format";
import { parseMessageTable, type MessageTable } from "./parser";
import { renderTemplate } from "./template";

export type FallbackSource =
  | Readonly<Record<string, readonly string[]>>
  | ((locale: string) => readonly string[]);

/** What resolve() does when no table in the chain has the key. */
export type MissingKeyPolicy = "error" | "key" | { text: string };
export type TableStatus = "absent" | "loading" | "ready";

export interface CatalogResolverOptions {
  /** Appended to every fallback chain. */
  defaultLocale?: string;
  /** Ordered fallback table ids per locale, excluding the locale itself. */
  fallbacks?: FallbackSource;
  missingKey?: MissingKeyPolicy;
  formatter?: ArgumentFormatter;
  /** Receives every validation warning as it is produced. */
  onIssue?: (issue: ValidationIssue) => void;
}

export interface ResolveOptions {
  missingKey?: MissingKeyPolicy;
}

export interface ValidateOptions {
  /** Also report keys whose placeholder names differ from the reference. */
  placeholders?: boolean;
}

export interface CatalogResolver {
  load(source: string, locale: string): void;
  reload(locale: string, source: string): Result<void, ParseError>;
  loadFrom(locale: string, fetchSource: () => Promise<string>): Promise<Result<void, ParseError>>;
  resolve(
    locale: string,
    key: string,
    args?: RenderArguments,
    opts?: ResolveOptions,
  ): Result<string, ResolutionError>;
  resolveOrThrow(locale: string, key: string, args?: RenderArguments): string;
  has(locale: string, key: string): boolean;
  fallbackChain(locale: string): string[];
  listLocales(): Set<string>;
  listTables(): string[];
  getTable(tableId: string): MessageTable | undefined;
  status(tableId: string): TableStatus;
  validate(referenceLocale: string, opts?: ValidateOptions): ValidationIssue[];
  unload(tableId: string): boolean;
  clear(): void;
}

export const LAYER_SEPARATOR = "/";

export function tableId(locale: string, layer?: string | null): string {
  return layer ? `${layer}${LAYER_SEPARATOR}${locale}` : locale;
}

export function splitTableId(id: string): { layer: string | null; locale: string } {
  const at = id.indexOf(LAYER_SEPARATOR);
  if (at === -1) return { layer: null, locale: id };
  return { layer: id.slice(0, at), locale: id.slice(at + 1) };
}

/**
 * "zh-Hant-TW" → ["zh-Hant", "zh"]
 */
export function parentLocales(locale: string): string[] {
  const parts = locale.split("-");
  const parents: string[] = [];
  for (let size = parts.length - 1; size > 0; size--) {
    parents.push(parts.slice(0, size).join("-"));
  }
  return parents;
}

export interface LayerOptions {
  /** Shared layers consulted beneath the module table of each locale. */
  layers?: readonly string[];
  defaultLocale?: string;
  /** Extra locales tried after the parent locales, e.g. { "pt-BR": ["pt"] }. */
  overrides?: Readonly<Record<string, readonly string[]>>;
}

/**
 * zh-CN → shared/zh-CN → zh → shared/zh → en → shared/en
 * (the requested locale itself is not part of the returned chain)
 */
export function layeredChain(locale: string, opts: LayerOptions = {}): string[] {
  const layers = opts.layers ?? [];
  const candidates = unique([
    locale,
    ...parentLocales(locale),
    ...(opts.overrides?.[locale] ?? []),
    ...(opts.defaultLocale ? [opts.defaultLocale] : []),
  ]);
  const chain = candidates.flatMap((candidate) => [
    candidate,
    ...layers.map((layer) => tableId(candidate, layer)),
  ]);
  return chain.slice(1);
}

function unique(ids: readonly string[]): string[] {
  return [...new Set(ids)];
}

export function createCatalogResolver(options: CatalogResolverOptions = {}): CatalogResolver {
  const tables = new Map<string, MessageTable>();
  const queues = new Map<string, Promise<void>>();
  const pending = new Map<string, number>();
  const formatter = options.formatter ?? createJoinFormatter();
  const fallbacks: FallbackSource = options.fallbacks ?? {};
  const fallbacksFor = (locale: string): readonly string[] =>
    typeof fallbacks === "function" ? fallbacks(locale) : (fallbacks[locale] ?? []);
  const defaultPolicy = options.missingKey ?? "error";

  function load(source: string, locale: string): void {
    const table = parseMessageTable(source, locale);
    tables.set(locale, table);
  }

  function reload(locale: string, source: string): Result<void, ParseError> {
    try {
      load(source, locale);
      return { data: undefined };
    } catch (error) {
      if (error instanceof ParseError) return { error };
      throw error;
    }
  }

  function loadFrom(
    locale: string,
    fetchSource: () => Promise<string>,
  ): Promise<Result<void, ParseError>> {
    const previous = queues.get(locale) ?? Promise.resolve();
    pending.set(locale, (pending.get(locale) ?? 0) + 1);

    const run = (async () => {
      try {
        await previous;
        const source = await fetchSource();
        return reload(locale, source);
      } finally {
        const left = (pending.get(locale) ?? 1) - 1;
        if (left === 0) {
          pending.delete(locale);
          queues.delete(locale);
        } else {
          pending.set(locale, left);
        }
      }
    })();

    queues.set(
      locale,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }

  function fallbackChain(locale: string): string[] {
    return unique([
      locale,
      ...fallbacksFor(locale),
      ...(options.defaultLocale ? [options.defaultLocale] : []),
    ]);
  }

  function onMissing(
    locale: string,
    key: string,
    searched: string[],
    policy: MissingKeyPolicy,
  ): Result<string, ResolutionError> {
    if (policy === "error") return { error: new MissingKeyError(locale, key, searched) };
    if (policy === "key") return { data: key };
    return { data: policy.text };
  }

  function resolve(
    locale: string,
    key: string,
    args: RenderArguments = {},
    opts: ResolveOptions = {},
  ): Result<string, ResolutionError> {
    const chain = fallbackChain(locale);
    for (const id of chain) {
      const template = tables.get(id)?.entries.get(key);
      if (!template) continue;
      // format with the locale of the table that matched, not the requested one
      return renderTemplate(template, args, {
        key,
        locale: splitTableId(id).locale,
        formatter,
      });
    }
    return onMissing(locale, key, chain, opts.missingKey ?? defaultPolicy);
  }

  function resolveOrThrow(locale: string, key: string, args: RenderArguments = {}): string {
    const out = resolve(locale, key, args, { missingKey: "error" });
    if ("error" in out) throw out.error;
    return out.data;
  }

  function has(locale: string, key: string): boolean {
    return fallbackChain(locale).some((id) => tables.get(id)?.entries.has(key) ?? false);
  }

  function listLocales(): Set<string> {
    return new Set([...tables.keys()].map((id) => splitTableId(id).locale));
  }

  function listTables(): string[] {
    return [...tables.keys()].sort();
  }

  function status(id: string): TableStatus {
    if (tables.has(id)) return "ready";
    if (pending.has(id)) return "loading";
    return "absent";
  }

  function validate(referenceLocale: string, opts: ValidateOptions = {}): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const report = (issue: ValidationIssue) => {
      issues.push(issue);
      options.onIssue?.(issue);
    };

    for (const id of listTables()) {
      const { layer, locale } = splitTableId(id);
      if (locale === referenceLocale) continue;

      const referenceId = tableId(referenceLocale, layer);
      const reference = tables.get(referenceId);
      const table = tables.get(id);
      if (!table) continue;
      if (!reference) {
        report({
          severity: "warning",
          kind: "unknown-reference",
          tableId: id,
          referenceId,
          message: `${id}: reference table ${referenceId} is not loaded`,
        });
        continue;
      }

      for (const [key, template] of reference.entries) {
        const translated = table.entries.get(key);
        if (!translated) {
          report({
            severity: "warning",
            kind: "missing-key",
            tableId: id,
            referenceId,
            key,
            message: `${id}: missing "${key}"`,
          });
          continue;
        }
        if (opts.placeholders && !sameNames(template.placeholders, translated.placeholders)) {
          report({
            severity: "warning",
            kind: "placeholder-mismatch",
            tableId: id,
            referenceId,
            key,
            message: `${id}: "${key}" uses { ${translated.placeholders.join(", ")} }, ${referenceId} uses { ${template.placeholders.join(", ")} }`,
          });
        }
      }

      for (const key of table.entries.keys()) {
        if (reference.entries.has(key)) continue;
        report({
          severity: "warning",
          kind: "extra-key",
          tableId: id,
          referenceId,
          key,
          message: `${id}: "${key}" is not in ${referenceId}`,
        });
      }
    }

    return issues;
  }

  return {
    load,
    reload,
    loadFrom,
    resolve,
    resolveOrThrow,
    has,
    fallbackChain,
    listLocales,
    listTables,
    getTable: (id) => tables.get(id),
    status,
    validate,
    unload: (id) => tables.delete(id),
    clear: () => tables.clear(),
  };
}

function sameNames(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return b.every((name) => set.has(name));
}
