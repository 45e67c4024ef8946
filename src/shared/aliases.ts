// ──────────────────────────────────────────
// Identifier alias registry — loaded once, read-only
// ──────────────────────────────────────────

import fs from 'fs';
import { z } from 'zod';
import { CATEGORIES, Category } from './types';

const aliasFileSchema = z.object({
  identifiers: z.record(
    z.object({
      label: z.string(),
      aliases: z.array(z.string()).min(1),
      categories: z.array(z.enum(CATEGORIES)).optional(),
    })
  ),
  counterNameColumns: z.array(z.string()).default([]),
  nonCounterColumns: z.array(z.string()).default([]),
});

export type AliasDefinition = z.input<typeof aliasFileSchema>;

export interface AliasGroup {
  key: string;
  label: string;
  aliases: readonly string[];
  /** Null applies the group to every category. */
  categories: readonly Category[] | null;
}

export interface AliasRegistry {
  readonly groups: readonly AliasGroup[];
  /** Group keys whose aliases match the column; more than one means the name is ambiguous. */
  matchGroups(column: string, category: Category): string[];
  isIdentifierColumn(column: string, category: Category): boolean;
  isCounterNameColumn(column: string): boolean;
  isNonCounterColumn(column: string): boolean;
  label(groupKey: string): string;
}

/** Case- and punctuation-insensitive key: "EUtranCell Id" and "eutrancell_id" collide. */
export function aliasKey(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function createAliasRegistry(definition: AliasDefinition): AliasRegistry {
  const parsed = aliasFileSchema.parse(definition);

  const groups: AliasGroup[] = Object.entries(parsed.identifiers).map(([key, g]) =>
    Object.freeze({
      key,
      label: g.label,
      aliases: Object.freeze([...g.aliases]),
      categories: g.categories ? Object.freeze([...g.categories]) : null,
    })
  );

  const byAlias = new Map<string, AliasGroup[]>();
  for (const group of groups) {
    for (const alias of group.aliases) {
      const k = aliasKey(alias);
      const existing = byAlias.get(k) ?? [];
      if (!existing.includes(group)) existing.push(group);
      byAlias.set(k, existing);
    }
  }

  const counterNames = new Set(parsed.counterNameColumns.map(aliasKey));
  const nonCounters = new Set(parsed.nonCounterColumns.map(aliasKey));
  const labels = new Map(groups.map((g) => [g.key, g.label]));

  const matchGroups = (column: string, category: Category): string[] =>
    (byAlias.get(aliasKey(column)) ?? [])
      .filter((g) => g.categories === null || g.categories.includes(category))
      .map((g) => g.key);

  return Object.freeze({
    groups: Object.freeze(groups),
    matchGroups,
    isIdentifierColumn: (column: string, category: Category) => matchGroups(column, category).length > 0,
    isCounterNameColumn: (column: string) => counterNames.has(aliasKey(column)),
    isNonCounterColumn: (column: string) => nonCounters.has(aliasKey(column)),
    label: (groupKey: string) => labels.get(groupKey) ?? groupKey,
  });
}

const registries = new Map<string, AliasRegistry>();

export function loadAliasRegistry(file: string): AliasRegistry {
  let registry = registries.get(file);
  if (!registry) {
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    registry = createAliasRegistry(aliasFileSchema.parse(raw));
    registries.set(file, registry);
  }
  return registry;
}
