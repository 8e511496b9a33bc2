import { createClient } from "@/lib/supabase/server";
import type { AnalysisStatus, NewSkillAnalysisSnapshot, SkillAnalysisSnapshot } from "@/lib/db/types";

export async function createAnalysis(row: NewSkillAnalysisSnapshot): Promise<SkillAnalysisSnapshot> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("skill_analyses")
    .insert(row)
    .select("*")
    .single<SkillAnalysisSnapshot>();

  if (error) throw error;
  return data;
}

export async function getAnalysis(id: string, userId: string): Promise<SkillAnalysisSnapshot | null> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("skill_analyses")
    .select("*")
    .eq("id", id)
    .eq("user_id", userId)
    .maybeSingle<SkillAnalysisSnapshot>();

  if (error) throw error;
  return data;
}

/** Most recent first. */
export async function getLatestAnalysis(userId: string): Promise<SkillAnalysisSnapshot | null> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("skill_analyses")
    .select("*")
    .eq("user_id", userId)
    .order("created_at", { ascending: false })
    .limit(1)
    .maybeSingle<SkillAnalysisSnapshot>();

  if (error) throw error;
  return data;
}

/** Snapshots are immutable apart from status and the user's notes. */
export async function setAnalysisStatus(
  id: string,
  status: AnalysisStatus,
  userNotes?: string
): Promise<SkillAnalysisSnapshot> {
  const supabase = await createClient();
  const patch: { status: AnalysisStatus; user_notes?: string } = { status };
  if (userNotes) patch.user_notes = userNotes;

  const { data, error } = await supabase
    .from("skill_analyses")
    .update(patch)
    .eq("id", id)
    .select("*")
    .single<SkillAnalysisSnapshot>();

  if (error) throw error;
  return data;
}
