import { createClient } from "@/lib/supabase/server";
import { isUniqueViolation } from "@/lib/db/job-postings";
import type { NewUserSkill, SkillDetails, UserSkill } from "@/lib/db/types";
import { DuplicateSkillError } from "@/lib/errors";
import { mergeSkillDetails } from "@/lib/skills/merge";
import { normalizeSkill } from "@/lib/skills/normalize";

export type OnDuplicateSkill = "fail" | "merge";

export async function listUserSkills(userId: string): Promise<UserSkill[]> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("skills")
    .select("*")
    .eq("user_id", userId)
    .order("title")
    .returns<UserSkill[]>();

  if (error) throw error;
  return data ?? [];
}

export async function countUserSkills(userId: string): Promise<number> {
  const supabase = await createClient();
  const { count, error } = await supabase
    .from("skills")
    .select("id", { count: "exact", head: true })
    .eq("user_id", userId);

  if (error) throw error;
  return count ?? 0;
}

/** Case- and whitespace-insensitive title lookup. */
export async function findUserSkillByTitle(userId: string, title: string): Promise<UserSkill | null> {
  const key = normalizeSkill(title);
  const skills = await listUserSkills(userId);
  return skills.find((s) => normalizeSkill(s.title) === key) ?? null;
}

async function updateSkillDetails(id: string, details: SkillDetails): Promise<UserSkill> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("skills")
    .update({ details })
    .eq("id", id)
    .select("*")
    .single<UserSkill>();

  if (error) throw error;
  return data;
}

/**
 * One skill per normalized title per user. A second "Python" either fails
 * with DuplicateSkillError or has its details merged into the first.
 */
export async function createUserSkill(
  skill: NewUserSkill,
  onDuplicate: OnDuplicateSkill = "fail"
): Promise<{ skill: UserSkill; created: boolean }> {
  const existing = await findUserSkillByTitle(skill.user_id, skill.title);
  if (existing) {
    if (onDuplicate === "fail") throw new DuplicateSkillError(existing.title);
    const merged = await updateSkillDetails(existing.id, mergeSkillDetails(existing.details, skill.details));
    return { skill: merged, created: false };
  }

  const title = skill.title.trim();
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("skills")
    .insert({ ...skill, title })
    .select("*")
    .single<UserSkill>();

  if (error) {
    // the unique index on (user_id, lower(title)) caught a concurrent insert
    if (isUniqueViolation(error)) throw new DuplicateSkillError(title);
    throw error;
  }
  return { skill: data, created: true };
}
