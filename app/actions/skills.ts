import { z } from "zod";
import { getConfig } from "@/lib/config";
import { logError } from "@/lib/debug";
import { getJobPostingById } from "@/lib/db/job-postings";
import { createUserSkill, listUserSkills, type OnDuplicateSkill } from "@/lib/db/skills";
import type { UserSkill } from "@/lib/db/types";
import { DuplicateSkillError, errorMessage } from "@/lib/errors";
import { storySuggestionsForJob, type StorySuggestion } from "@/lib/skills/gap-analyzer";
import { getExperienceSuggestions, jobSkillsFor, matchJobSkills, type MatchReport } from "@/lib/skills/matcher";
import { categorizeSkill, determineSkillType } from "@/lib/skills/taxonomy";

const MAX_TITLE_LENGTH = 100;

const newSkillSchema = z.object({
  title: z.string().trim().min(1, "Skill title is required").max(MAX_TITLE_LENGTH),
  category: z.string().trim().min(1).optional(),
  skill_type: z.enum(["Soft", "Hard", "Technical", "Transferable", "Other"]).optional(),
  skill_level: z.enum(["Entry", "Intermediate", "Advanced", "Expert", "Mastery"]).optional(),
  years_experience: z.number().int().min(0).max(80).optional(),
  alternates: z.array(z.string().trim().min(1)).optional(),
});

export type NewSkillInput = z.input<typeof newSkillSchema>;

/**
 * Add a skill to the user's inventory. With onDuplicate "fail" (the default)
 * a title the user already holds, in any casing, is an error; "merge" folds
 * the alternates into the existing skill instead.
 */
export async function addSkill(
  userId: string,
  input: NewSkillInput,
  onDuplicate: OnDuplicateSkill = "fail"
): Promise<{ error?: string; result?: { skill: UserSkill; created: boolean } }> {
  const parsed = newSkillSchema.safeParse(input);
  if (!parsed.success) {
    return { error: parsed.error.issues[0]?.message ?? "Invalid skill." };
  }
  const s = parsed.data;

  try {
    const result = await createUserSkill(
      {
        user_id: userId,
        title: s.title,
        category: s.category ?? categorizeSkill(s.title),
        skill_type: s.skill_type ?? determineSkillType(s.title),
        skill_level: s.skill_level ?? null,
        years_experience: s.years_experience ?? null,
        details: s.alternates ? { alternates: s.alternates } : {},
      },
      onDuplicate
    );
    return { result };
  } catch (err) {
    if (err instanceof DuplicateSkillError) return { error: err.message };
    logError("addSkill failed:", err);
    return { error: errorMessage(err) };
  }
}

/** Score one stored job against the user's current skills. */
export async function matchJobForUser(
  userId: string,
  jobPostingId: string
): Promise<{ error?: string; result?: MatchReport }> {
  try {
    const posting = await getJobPostingById(jobPostingId);
    if (!posting) return { error: "Job posting not found." };
    if (!posting.scraping_success) {
      return { error: "This job could not be scraped. Paste its description to analyze it." };
    }
    const skills = await listUserSkills(userId);
    return { result: matchJobSkills(skills, jobSkillsFor(posting.raw_json), getConfig().matcher) };
  } catch (err) {
    logError("matchJobForUser failed:", err);
    return { error: errorMessage(err) };
  }
}

/** Writing prompts for an experience that would demonstrate the skill. */
export async function getSkillSuggestions(skillName: string) {
  const name = skillName.trim();
  if (!name) return { error: "Skill name is required." };
  return { result: getExperienceSuggestions(name) };
}

/** The first few skills this job asks for that the user has no experience story for. */
export async function getStorySuggestions(
  userId: string,
  jobPostingId: string,
  topN = 3
): Promise<{ error?: string; result?: StorySuggestion[] }> {
  try {
    const posting = await getJobPostingById(jobPostingId);
    if (!posting) return { error: "Job posting not found." };
    const skills = await listUserSkills(userId);
    return { result: storySuggestionsForJob(posting, skills, topN) };
  } catch (err) {
    logError("getStorySuggestions failed:", err);
    return { error: errorMessage(err) };
  }
}
