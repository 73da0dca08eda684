import { MissingArgumentError, type Result } from "./errors";
import { formatValue, type ArgumentFormatter, type RenderArguments } from "./format";

export type Segment =
  | { kind: "text"; text: string }
  | { kind: "placeholder"; name: string };

export interface MessageTemplate {
  readonly source: string;
  readonly segments: readonly Segment[];
  /** Distinct placeholder names, first-seen order. */
  readonly placeholders: readonly string[];
}

export interface TemplateSyntaxError {
  /** 1-based column within the template text. */
  column: number;
  reason: string;
}

const OPEN = "{ $";
const CLOSE = " }";
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*/;

/**
 * Single left-to-right scan for `{ $name }`. Everything outside a placeholder,
 * including lone braces, is literal text.
 */
export function scanTemplate(source: string): Result<MessageTemplate, TemplateSyntaxError> {
  const segments: Segment[] = [];
  const placeholders: string[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf(OPEN, cursor);
    if (open === -1) {
      segments.push({ kind: "text", text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ kind: "text", text: source.slice(cursor, open) });
    }

    const nameStart = open + OPEN.length;
    const match = NAME_PATTERN.exec(source.slice(nameStart));
    if (!match) {
      return { error: { column: nameStart + 1, reason: "expected a placeholder name after '{ $'" } };
    }
    const name = match[0];
    const nameEnd = nameStart + name.length;
    if (!source.startsWith(CLOSE, nameEnd)) {
      return { error: { column: nameEnd + 1, reason: `placeholder "${name}" must be closed with ' }'` } };
    }

    segments.push({ kind: "placeholder", name });
    if (!placeholders.includes(name)) placeholders.push(name);
    cursor = nameEnd + CLOSE.length;
  }

  return { data: { source, segments, placeholders } };
}

export interface RenderContext {
  key: string;
  locale: string;
  formatter: ArgumentFormatter;
}

export function renderTemplate(
  template: MessageTemplate,
  args: RenderArguments,
  ctx: RenderContext,
): Result<string, MissingArgumentError> {
  const rendered = new Map<string, string>();

  for (const name of template.placeholders) {
    const value = Object.hasOwn(args, name) ? args[name] : undefined;
    if (value === undefined) {
      return { error: new MissingArgumentError(ctx.locale, ctx.key, name) };
    }
    rendered.set(name, formatValue(value, ctx.locale, ctx.formatter));
  }

  let out = "";
  for (const segment of template.segments) {
    out += segment.kind === "text" ? segment.text : (rendered.get(segment.name) ?? "");
  }
  return { data: out };
}
