import { createClient } from "@/lib/supabase/server";
import { isUniqueViolation, listJobPostingsByIds } from "@/lib/db/job-postings";
import type { JobPosting, SavedJob } from "@/lib/db/types";

export async function getSavedJob(userId: string, jobPostingId: string): Promise<SavedJob | null> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("saved_jobs")
    .select("*")
    .eq("user_id", userId)
    .eq("job_posting_id", jobPostingId)
    .maybeSingle<SavedJob>();

  if (error) throw error;
  return data;
}

/** A user saves a posting once; saving again returns the existing link. */
export async function getOrCreateSavedJob(
  userId: string,
  jobPostingId: string
): Promise<{ savedJob: SavedJob; created: boolean }> {
  const existing = await getSavedJob(userId, jobPostingId);
  if (existing) return { savedJob: existing, created: false };

  const supabase = await createClient();
  const { data, error } = await supabase
    .from("saved_jobs")
    .insert({ user_id: userId, job_posting_id: jobPostingId, status: "saved", notes: "" })
    .select("*")
    .single<SavedJob>();

  if (error) {
    if (!isUniqueViolation(error)) throw error;
    const winner = await getSavedJob(userId, jobPostingId);
    if (!winner) throw error;
    return { savedJob: winner, created: false };
  }
  return { savedJob: data, created: true };
}

/** Every posting the user has saved. */
export async function listSavedJobPostings(userId: string): Promise<JobPosting[]> {
  const supabase = await createClient();
  const { data: saved, error } = await supabase
    .from("saved_jobs")
    .select("job_posting_id")
    .eq("user_id", userId)
    .returns<Pick<SavedJob, "job_posting_id">[]>();

  if (error) throw error;
  if (!saved?.length) return [];
  return listJobPostingsByIds(saved.map((s) => s.job_posting_id));
}

export async function countSavedJobs(userId: string): Promise<number> {
  const supabase = await createClient();
  const { count, error } = await supabase
    .from("saved_jobs")
    .select("id", { count: "exact", head: true })
    .eq("user_id", userId);

  if (error) throw error;
  return count ?? 0;
}
