import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const aliasTableSchema = z.object({
  compound_suffixes: z.array(z.string().min(1)).default([]),
  aliases: z.record(z.array(z.string().min(1))).default({}),
  character_variants: z.array(z.tuple([z.string().length(1), z.string().length(1)])).default([]),
});

export type AliasTable = z.infer<typeof aliasTableSchema>;

export const ALIAS_TABLE_FILE = "entity-aliases.json";

const PARENTHETICAL_PATTERN = /\s*[(（][^()（）]*[)）]\s*$/u;
const WORD_CHAR_PATTERN = /\w/;

function bundledAliasTableCandidates(): string[] {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return [
    path.resolve(here, "..", "..", "data", ALIAS_TABLE_FILE),
    path.resolve(here, "..", "..", "..", "data", ALIAS_TABLE_FILE),
  ];
}

export function parseAliasTable(raw: unknown, source: string): AliasTable {
  const parsed = aliasTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid alias table at ${source}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return parsed.data;
}

/** Reads the alias table from `filePath`, or the one shipped in `data/`. */
export function loadAliasTable(filePath?: string): AliasTable {
  const candidates = filePath ? [filePath] : bundledAliasTableCandidates();
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Alias table not found (looked in ${candidates.join(", ")})`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(found, "utf8"));
  } catch (error) {
    throw new Error(
      `Failed to parse alias table at ${found}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseAliasTable(raw, found);
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function termPattern(term: string): string {
  const escaped = escapeRegExp(term);
  const leading = WORD_CHAR_PATTERN.test(term.charAt(0)) ? "\\b" : "";
  const trailing = WORD_CHAR_PATTERN.test(term.charAt(term.length - 1)) ? "\\b" : "";
  return `${leading}${escaped}${trailing}`;
}

/**
 * Maps surface strings onto canonical entity names and finds every spelling
 * of a canonical name in source text.
 */
export class EntityNormalizer {
  private readonly suffixes: string[];
  private readonly variantPairs: Array<[string, string]>;
  private readonly canonicalByKey = new Map<string, string>();
  private readonly aliasesByCanonical = new Map<string, string[]>();
  private readonly patternCache = new Map<string, RegExp>();

  constructor(table: AliasTable) {
    // Longest first so "was arrested" wins over a shorter overlapping suffix.
    this.suffixes = [...table.compound_suffixes].sort((a, b) => b.length - a.length);
    this.variantPairs = table.character_variants;

    for (const [canonical, aliases] of Object.entries(table.aliases)) {
      this.aliasesByCanonical.set(canonical, aliases);
      for (const surface of [canonical, ...aliases]) {
        for (const variant of this.substitutions(surface)) {
          this.canonicalByKey.set(variant.toLowerCase(), canonical);
        }
      }
    }
  }

  private substitutions(term: string): string[] {
    const variants = new Set<string>([term]);
    for (const [left, right] of this.variantPairs) {
      if (term.includes(left)) {
        variants.add(term.split(left).join(right));
      }
      if (term.includes(right)) {
        variants.add(term.split(right).join(left));
      }
    }
    return Array.from(variants);
  }

  /** Removes one trailing action word when a non-empty core remains. */
  stripCompoundSuffix(raw: string): string {
    const value = collapseWhitespace(raw);
    const lowered = value.toLowerCase();
    for (const suffix of this.suffixes) {
      if (lowered.endsWith(suffix.toLowerCase())) {
        const cut = value.length - suffix.length;
        if (WORD_CHAR_PATTERN.test(suffix.charAt(0)) && !/\s/.test(value.charAt(cut - 1))) {
          continue;
        }
        const core = value.slice(0, cut).trim();
        if (core.length > 0) {
          return core;
        }
      }
    }
    return value;
  }

  canonicalize(raw: string): string {
    let core = this.stripCompoundSuffix(raw);
    const withoutParenthetical = core.replace(PARENTHETICAL_PATTERN, "").trim();
    if (withoutParenthetical.length > 0) {
      core = withoutParenthetical;
    }
    return this.canonicalByKey.get(core.toLowerCase()) ?? core;
  }

  /** The canonical name, its aliases, and each with its character variants applied. */
  variantsOf(canonical: string): string[] {
    const surfaces = [canonical, ...(this.aliasesByCanonical.get(canonical) ?? [])];
    const variants = new Set<string>();
    for (const surface of surfaces) {
      for (const variant of this.substitutions(surface)) {
        variants.add(variant);
      }
    }
    return Array.from(variants);
  }

  private patternFor(canonical: string): RegExp {
    const cached = this.patternCache.get(canonical);
    if (cached) {
      return cached;
    }
    const terms = this.variantsOf(canonical)
      .filter((term) => term.length > 0)
      .sort((a, b) => b.length - a.length);
    const pattern = new RegExp(terms.map(termPattern).join("|"), "giu");
    this.patternCache.set(canonical, pattern);
    return pattern;
  }

  /** Non-overlapping, case-insensitive occurrences of any spelling; longer spellings win. */
  countMentions(text: string, canonical: string): number {
    if (!text || !canonical.trim()) {
      return 0;
    }
    return Array.from(text.matchAll(this.patternFor(canonical))).length;
  }

  mentionsIn(texts: Iterable<string>, canonical: string): number {
    let total = 0;
    for (const text of texts) {
      total += this.countMentions(text, canonical);
    }
    return total;
  }
}
