/**
 * Typed message schemas: key → placeholder names a game passes.
 * A messenger built from a schema checks argument names at compile time.
 */
import type { ResolutionError, Result, ValidationIssue } from "../catalog/errors";
import type { ArgumentValue, RenderArguments } from "../catalog/format";
import type { CatalogResolver } from "../catalog/resolver";

export type MessageSchema = Readonly<Record<string, readonly string[]>>;

export type MessageArgs<S extends MessageSchema, K extends keyof S> = {
  readonly [P in S[K][number]]: ArgumentValue;
} & RenderArguments;

export interface Messenger<S extends MessageSchema> {
  say<K extends keyof S & string>(locale: string, key: K, args: MessageArgs<S, K>): Result<string, ResolutionError>;
  /**
   * Missing keys render as the key itself; a missing argument still throws.
   */
  text<K extends keyof S & string>(locale: string, key: K, args: MessageArgs<S, K>): string;
}

/** Keys every game module shares (round, scores, options, action gating). */
export const SHARED_MESSAGES = {
  "game-round-start": ["round"],
  "game-final-scores": [],
  "game-points": ["count"],
  "game-set-target-score": ["score"],
  "game-enter-target-score": [],
  "game-option-changed-target": ["score"],
  "action-not-playing": [],
  "action-spectator": [],
  "action-not-your-turn": [],
  "category-dice-games": [],
} as const satisfies MessageSchema;

export function createMessenger<S extends MessageSchema>(
  resolver: CatalogResolver,
  _schema: S,
): Messenger<S> {
  return {
    say(locale, key, args) {
      return resolver.resolve(locale, key, args);
    },
    text(locale, key, args) {
      const out = resolver.resolve(locale, key, args, { missingKey: "key" });
      if ("error" in out) throw out.error;
      return out.data;
    },
  };
}

/**
 * Compares what a game expects against what the catalog serves for a locale,
 * fallbacks included.
 */
export function checkSchema(
  resolver: CatalogResolver,
  locale: string,
  schema: MessageSchema,
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const chain = resolver.fallbackChain(locale);

  for (const [key, expected] of Object.entries(schema)) {
    const foundIn = chain.find((id) => resolver.getTable(id)?.entries.has(key));
    const template = foundIn ? resolver.getTable(foundIn)?.entries.get(key) : undefined;
    if (!foundIn || !template) {
      issues.push({
        severity: "warning",
        kind: "missing-key",
        tableId: locale,
        referenceId: "schema",
        key,
        message: `${locale}: no table in ${chain.join(" > ")} has "${key}"`,
      });
      continue;
    }

    const unknown = template.placeholders.filter((name) => !expected.includes(name));
    if (unknown.length > 0) {
      issues.push({
        severity: "warning",
        kind: "placeholder-mismatch",
        tableId: foundIn,
        referenceId: "schema",
        key,
        message: `${foundIn}: "${key}" uses ${unknown.map((n) => `{ $${n} }`).join(" ")} which callers never pass`,
      });
    }
  }

  return issues;
}
