import {
  ENTITY_TYPES,
  type Atom,
  type EntitiesAnalysis,
  type EntityFragment,
  type EntityIndex,
  type EntityRecord,
  type EntityStatistics,
  type EntityType,
} from "../types.js";
import type { EntityNormalizer } from "./normalize.js";

/** Text and store position of every atom, keyed by atom id. */
export type AtomLookup = Map<string, { text: string; position: number }>;

export function buildAtomLookup(atoms: readonly Atom[]): AtomLookup {
  const lookup: AtomLookup = new Map();
  atoms.forEach((atom, position) => {
    lookup.set(atom.atom_id, { text: atom.merged_text, position });
  });
  return lookup;
}

export function emptyEntityFragment(): EntityFragment {
  return {
    persons: [],
    countries: [],
    organizations: [],
    time_points: [],
    events: [],
    concepts: [],
  };
}

export function computeEntityStatistics(fragment: EntityFragment): EntityStatistics {
  const byType: Record<EntityType, number> = {
    persons: fragment.persons.length,
    countries: fragment.countries.length,
    organizations: fragment.organizations.length,
    time_points: fragment.time_points.length,
    events: fragment.events.length,
    concepts: fragment.concepts.length,
  };
  return {
    total_entities: ENTITY_TYPES.reduce((sum, type) => sum + byType[type], 0),
    by_type: byType,
  };
}

export function emptyEntityIndex(): EntityIndex {
  const fragment = emptyEntityFragment();
  return { ...fragment, statistics: computeEntityStatistics(fragment) };
}

function sortAtomIds(atomIds: Iterable<string>, lookup: AtomLookup): string[] {
  return Array.from(atomIds).sort(
    (a, b) => (lookup.get(a)?.position ?? Number.MAX_SAFE_INTEGER) - (lookup.get(b)?.position ?? Number.MAX_SAFE_INTEGER),
  );
}

function sortRecords(records: EntityRecord[]): EntityRecord[] {
  return records.sort((a, b) => b.mentions - a.mentions || a.name.localeCompare(b.name));
}

export interface EntityFragmentInput {
  segmentId: string;
  entities: EntitiesAnalysis;
  primaryTopic: string | null;
  atoms: readonly Atom[];
  normalizer: EntityNormalizer;
}

/**
 * Canonicalises the raw names for one segment and locates them in the
 * segment's atoms. Raw names sharing a canonical form collapse into one record.
 */
export function buildEntityFragment(input: EntityFragmentInput): EntityFragment {
  const fragment = emptyEntityFragment();
  const lookup = buildAtomLookup(input.atoms);

  for (const type of ENTITY_TYPES) {
    const names = new Set<string>();
    for (const raw of input.entities[type]) {
      const canonical = input.normalizer.canonicalize(raw);
      if (canonical) {
        names.add(canonical);
      }
    }

    fragment[type] = sortRecords(
      Array.from(names).map((name) => {
        const matching = input.atoms.filter((atom) => input.normalizer.countMentions(atom.merged_text, name) > 0);
        return {
          name,
          type,
          mentions: input.normalizer.mentionsIn(
            matching.map((atom) => atom.merged_text),
            name,
          ),
          atom_ids: sortAtomIds(
            matching.map((atom) => atom.atom_id),
            lookup,
          ),
          segment_ids: [input.segmentId],
          context: input.primaryTopic ? [input.primaryTopic] : [],
        };
      }),
    );
  }

  return fragment;
}

function union(left: readonly string[], right: readonly string[]): string[] {
  return Array.from(new Set([...left, ...right]));
}

/**
 * Unions a fragment into the index. `mentions` is recounted from the union of
 * atom texts, so merging the same fragment twice changes nothing.
 */
export function mergeEntities(
  index: EntityIndex,
  fragment: EntityFragment,
  lookup: AtomLookup,
  normalizer: EntityNormalizer,
): EntityIndex {
  const merged = emptyEntityFragment();

  for (const type of ENTITY_TYPES) {
    const byName = new Map<string, EntityRecord>();
    for (const record of index[type]) {
      byName.set(record.name, record);
    }

    for (const incoming of fragment[type]) {
      const existing = byName.get(incoming.name);
      byName.set(
        incoming.name,
        existing
          ? {
              ...existing,
              atom_ids: union(existing.atom_ids, incoming.atom_ids),
              segment_ids: union(existing.segment_ids, incoming.segment_ids).sort(),
              context: union(existing.context, incoming.context),
            }
          : { ...incoming },
      );
    }

    merged[type] = sortRecords(
      Array.from(byName.values()).map((record) => {
        const atomIds = sortAtomIds(
          record.atom_ids.filter((atomId) => lookup.has(atomId)),
          lookup,
        );
        const texts = atomIds.map((atomId) => lookup.get(atomId)?.text ?? "");
        return {
          ...record,
          atom_ids: atomIds,
          mentions: normalizer.mentionsIn(texts, record.name),
        };
      }),
    );
  }

  return { ...merged, statistics: computeEntityStatistics(merged) };
}

export function countFragmentEntities(fragment: EntityFragment): number {
  return computeEntityStatistics(fragment).total_entities;
}
