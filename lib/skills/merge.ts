import type { SkillDetails } from "@/lib/db/types";

function union(a: string[] | undefined, b: string[] | undefined): string[] | undefined {
  if (!a && !b) return undefined;
  return [...new Set([...(a ?? []), ...(b ?? [])])];
}

/**
 * Details of an existing skill after the same skill was added again.
 * Alternate names and source experience ids are unioned; the mention count
 * follows the number of distinct source experiences when there are any.
 */
export function mergeSkillDetails(existing: SkillDetails, incoming: SkillDetails): SkillDetails {
  const merged: SkillDetails = { ...existing, ...incoming };
  const alternates = union(existing.alternates, incoming.alternates);
  if (alternates) merged.alternates = alternates;
  const sources = union(existing.extracted_from_experiences, incoming.extracted_from_experiences);
  if (sources) {
    merged.extracted_from_experiences = sources;
    merged.mention_count = sources.length;
  }
  return merged;
}
