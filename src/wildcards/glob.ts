/**
 * Wildcard name globs. `*` matches within one path segment, `**` across
 * segments.
 */

export function isGlob(name: string): boolean {
  return name.includes("*");
}

export function compileGlob(pattern: string): RegExp {
  const source = pattern
    .split(/(\*\*|\*)/)
    .map((part) => {
      if (part === "**") return ".*";
      if (part === "*") return "[^/]*";
      return part.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`);
}

/**
 * Values of every name matching `pattern`, concatenated in sorted-name
 * order with duplicates removed.
 */
export function resolveGlob(
  pattern: string,
  names: Iterable<string>,
  valuesOf: (name: string) => readonly string[]
): string[] {
  const matcher = compileGlob(pattern);
  const values = new Set<string>();
  for (const name of [...names].filter((candidate) => matcher.test(candidate)).sort()) {
    for (const value of valuesOf(name)) {
      values.add(value);
    }
  }
  return [...values];
}
