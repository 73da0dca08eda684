/**
 * Dicehall – 카탈로그 원문 공급자
 *
 * - files: <catalogDir>/<layer>/<locale>.ftl
 * - supabase: message_sources(layer, locale, source_text, updated_at)
 *
 * 두 공급자 모두 원문만 돌려주고 파싱은 resolver가 한다.
 */
import { readdir, readFile } from "node:fs/promises";
import nodePath from "node:path";
import type { DbAccessor } from "./db";

export interface CatalogSourceEntry {
  layer: string;
  locale: string;
  source: string;
}

export interface CatalogSourceProvider {
  kind: string;
  list(): Promise<CatalogSourceEntry[]>;
  /** 단일 원문 저장. 읽기 전용 공급자는 생략한다. */
  save?(entry: CatalogSourceEntry): Promise<void>;
}

const SOURCE_EXT = ".ftl";

export function createFileSource(catalogDir: string): CatalogSourceProvider {
  async function list(): Promise<CatalogSourceEntry[]> {
    const entries: CatalogSourceEntry[] = [];
    const layers = await readdir(catalogDir, { withFileTypes: true });

    for (const layerDir of layers) {
      if (!layerDir.isDirectory()) continue;
      const files = await readdir(nodePath.join(catalogDir, layerDir.name));
      for (const file of files.sort()) {
        if (!file.endsWith(SOURCE_EXT)) continue;
        const source = await readFile(nodePath.join(catalogDir, layerDir.name, file), "utf-8");
        entries.push({
          layer: layerDir.name,
          locale: file.slice(0, -SOURCE_EXT.length),
          source,
        });
      }
    }

    return entries;
  }

  return { kind: "files", list };
}

interface MessageSourceRow {
  layer: string;
  locale: string;
  source_text: string;
}

function isMessageSourceRow(row: unknown): row is MessageSourceRow {
  if (!row || typeof row !== "object") return false;
  return (
    "layer" in row && typeof row.layer === "string" &&
    "locale" in row && typeof row.locale === "string" &&
    "source_text" in row && typeof row.source_text === "string"
  );
}

export function createSupabaseSource(getDb: DbAccessor): CatalogSourceProvider {
  async function list(): Promise<CatalogSourceEntry[]> {
    const db = getDb();
    const { data, error } = await db
      .from("message_sources")
      .select("layer, locale, source_text")
      .order("layer")
      .order("locale");

    if (error) {
      throw new Error(`message_sources query failed: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    return rows.filter(isMessageSourceRow).map((row) => ({
      layer: row.layer,
      locale: row.locale,
      source: row.source_text,
    }));
  }

  async function save(entry: CatalogSourceEntry): Promise<void> {
    const db = getDb();
    const { error } = await db.from("message_sources").upsert(
      {
        layer: entry.layer,
        locale: entry.locale,
        source_text: entry.source,
        updated_at: new Date().toISOString(),
      },
      { onConflict: "layer,locale" },
    );

    if (error) {
      throw new Error(`message_sources upsert failed: ${error.message}`);
    }
  }

  return { kind: "supabase", list, save };
}
