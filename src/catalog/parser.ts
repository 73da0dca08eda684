/**
 * Line-oriented catalog source parser.
 *
 *   # comment
 *   tossup-you-bank = You bank { $points } points. Total: { $total }.
 *
 * A table is accepted whole or not at all.
 */
import { ParseError } from "./errors";
import { scanTemplate, type MessageTemplate } from "./template";

export interface MessageTable {
  readonly id: string;
  readonly entries: ReadonlyMap<string, MessageTemplate>;
}

const BOM = "\uFEFF";
const SEPARATOR = " = ";
const KEY_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

export function parseMessageTable(source: string, tableId: string): MessageTable {
  const entries = new Map<string, MessageTemplate>();
  const lines = (source.startsWith(BOM) ? source.slice(BOM.length) : source).split("\n");

  for (let index = 0; index < lines.length; index++) {
    const lineNo = index + 1;
    const line = lines[index].endsWith("\r") ? lines[index].slice(0, -1) : lines[index];

    if (line.trim() === "") continue;
    if (line.startsWith("#")) continue;
    if (/^\s/.test(line)) {
      throw new ParseError(tableId, lineNo, "indented continuation lines are not supported");
    }

    const sep = line.indexOf(SEPARATOR);
    if (sep === -1) {
      throw new ParseError(tableId, lineNo, "expected '<key> = <template>'");
    }

    const key = line.slice(0, sep);
    if (!KEY_PATTERN.test(key)) {
      throw new ParseError(tableId, lineNo, "invalid message key", key);
    }
    if (entries.has(key)) {
      throw new ParseError(tableId, lineNo, "duplicate message key", key);
    }

    const text = line.slice(sep + SEPARATOR.length);
    if (text.trim() === "") {
      throw new ParseError(tableId, lineNo, "empty template", key);
    }

    const scanned = scanTemplate(text);
    if ("error" in scanned) {
      const column = sep + SEPARATOR.length + scanned.error.column;
      throw new ParseError(tableId, lineNo, `column ${column}: ${scanned.error.reason}`, key);
    }
    entries.set(key, scanned.data);
  }

  return Object.freeze({ id: tableId, entries });
}
