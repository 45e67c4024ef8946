// ──────────────────────────────────────────
// Ingestion: header canonicalisation
// ──────────────────────────────────────────

export function canonicalColumnName(raw: string): string {
  return raw
    .replace(/^\uFEFF/, '')
    .trim()
    .replace(/^"(.*)"$/, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Blank names become positional; repeats get `_2`, `_3`… until unique. */
export function canonicalColumnNames(header: string[]): string[] {
  const used = new Set<string>();
  return header.map((raw, i) => {
    const base = canonicalColumnName(raw) || `col_${i + 1}`;
    let name = base;
    for (let n = 2; used.has(name); n++) {
      name = `${base}_${n}`;
    }
    used.add(name);
    return name;
  });
}
