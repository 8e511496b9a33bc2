/** Matcher key for a skill name: trimmed, lower-cased, inner whitespace collapsed. */
export function normalizeSkill(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Normalize, drop empties and de-duplicate while keeping first-seen order. */
export function normalizeSkillList(names: Iterable<string>): string[] {
  const out = new Set<string>();
  for (const n of names) {
    const key = normalizeSkill(n);
    if (key) out.add(key);
  }
  return [...out];
}

/** Upper-case every letter that follows a non-letter ("machine learning" → "Machine Learning", "ci/cd" → "Ci/Cd"). */
export function titleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, before: string, c: string) => before + c.toUpperCase());
}
