import type { Experience, NewUserSkill, SkillType } from "@/lib/db/types";
import { getSkillDatabase, type SkillDatabase } from "@/lib/requirements/skill-database";
import { normalizeSkill, titleCase } from "@/lib/skills/normalize";
import { categorizeSkill, determineSkillType } from "@/lib/skills/taxonomy";

/** A skill found in the user's experiences, before it is stored. */
export type SkillDraft = {
  key: string;
  title: string;
  category: string;
  skill_type: SkillType;
  years_experience: number;
  experience_ids: string[];
  mention_count: number;
};

const MAX_YEARS = 10;

/** Keyword hits in free text (substring match on the lower-cased text). */
export function skillsInText(text: string, db: SkillDatabase = getSkillDatabase()): string[] {
  const lower = text.toLowerCase();
  return db.experienceKeywords.filter((k) => lower.includes(k));
}

/**
 * Distinct calendar years covered by the dated experiences, capped at 10.
 * Undated experiences don't count; with none dated the estimate is 1.
 */
export function estimateYearsExperience(experiences: Experience[], now: Date = new Date()): number {
  const years = new Set<number>();
  for (const exp of experiences) {
    if (!exp.date_started) continue;
    const start = new Date(exp.date_started).getUTCFullYear();
    const end = exp.date_finished ? new Date(exp.date_finished).getUTCFullYear() : now.getUTCFullYear();
    for (let y = start; y <= end; y++) years.add(y);
  }
  if (years.size === 0) return 1;
  return Math.min(years.size, MAX_YEARS);
}

export function extractSkillsFromExperiences(
  experiences: Experience[],
  now: Date = new Date(),
  db: SkillDatabase = getSkillDatabase()
): SkillDraft[] {
  const mentions = new Map<string, string[]>();
  const byId = new Map<string, Experience>();

  for (const exp of experiences) {
    if (exp.visibility === "draft") continue;
    byId.set(exp.id, exp);
    const found = [...exp.skills_used, ...exp.tags, ...skillsInText(exp.description, db)];
    for (const raw of found) {
      const key = normalizeSkill(raw);
      if (!key) continue;
      const ids = mentions.get(key) ?? [];
      ids.push(exp.id);
      mentions.set(key, ids);
    }
  }

  return [...mentions].map(([key, ids]) => {
    const distinct = [...new Set(ids)];
    const linked = distinct.flatMap((id) => byId.get(id) ?? []);
    const title = titleCase(key);
    return {
      key,
      title,
      category: categorizeSkill(title),
      skill_type: determineSkillType(title),
      years_experience: estimateYearsExperience(linked, now),
      experience_ids: distinct,
      mention_count: ids.length,
    };
  });
}

export function draftToNewSkill(userId: string, draft: SkillDraft): NewUserSkill {
  return {
    user_id: userId,
    title: draft.title,
    category: draft.category,
    skill_type: draft.skill_type,
    skill_level: null,
    years_experience: draft.years_experience,
    details: {
      extracted_from_experiences: draft.experience_ids,
      mention_count: draft.mention_count,
    },
  };
}

