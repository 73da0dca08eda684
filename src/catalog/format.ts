/**
 * Argument formatting strategies.
 *
 * The resolver only knows how to splice strings; numbers and lists go through
 * an injected ArgumentFormatter so digit grouping and list punctuation stay
 * locale data rather than resolver logic.
 */
export type ArgumentValue = string | number | readonly (string | number)[];
export type RenderArguments = Readonly<Record<string, ArgumentValue>>;

export interface ArgumentFormatter {
  formatNumber(value: number, locale: string): string;
  formatList(items: readonly string[], locale: string): string;
}

export interface JoinFormatterOptions {
  /** Separator per locale id, e.g. { "zh-CN": "、" }. */
  listSeparators?: Record<string, string>;
  defaultSeparator?: string;
}

/**
 * Exact locale first, then its language subtag ("zh-CN" → "zh").
 */
function lookupByLocale<T>(table: Record<string, T>, locale: string): T | undefined {
  if (Object.hasOwn(table, locale)) return table[locale];
  const language = locale.split("-")[0];
  if (language !== locale && Object.hasOwn(table, language)) return table[language];
  return undefined;
}

export function createJoinFormatter(options: JoinFormatterOptions = {}): ArgumentFormatter {
  const separators = options.listSeparators ?? {};
  const fallbackSeparator = options.defaultSeparator ?? ", ";

  return {
    formatNumber(value) {
      return String(value);
    },
    formatList(items, locale) {
      return items.join(lookupByLocale(separators, locale) ?? fallbackSeparator);
    },
  };
}

const INTL_FALLBACK_LOCALE = "en";

/**
 * Intl.NumberFormat / Intl.ListFormat backed formatter ("1,234", "A, B and C").
 * Unknown locale tags fall back to English formatting.
 */
export function createIntlFormatter(): ArgumentFormatter {
  const numberFormats = new Map<string, Intl.NumberFormat>();
  const listFormats = new Map<string, Intl.ListFormat>();

  function numberFormat(locale: string): Intl.NumberFormat {
    let format = numberFormats.get(locale);
    if (!format) {
      try {
        format = new Intl.NumberFormat(locale);
      } catch {
        // RangeError: malformed locale tag
        format = new Intl.NumberFormat(INTL_FALLBACK_LOCALE);
      }
      numberFormats.set(locale, format);
    }
    return format;
  }

  function listFormat(locale: string): Intl.ListFormat {
    let format = listFormats.get(locale);
    if (!format) {
      try {
        format = new Intl.ListFormat(locale, { style: "long", type: "conjunction" });
      } catch {
        format = new Intl.ListFormat(INTL_FALLBACK_LOCALE, { style: "long", type: "conjunction" });
      }
      listFormats.set(locale, format);
    }
    return format;
  }

  return {
    formatNumber(value, locale) {
      return numberFormat(locale).format(value);
    },
    formatList(items, locale) {
      return listFormat(locale).format(items);
    },
  };
}

export function formatValue(
  value: ArgumentValue,
  locale: string,
  formatter: ArgumentFormatter,
): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return formatter.formatNumber(value, locale);
  const items = value.map((item) =>
    typeof item === "number" ? formatter.formatNumber(item, locale) : item,
  );
  return formatter.formatList(items, locale);
}
