import { createClient } from "@/lib/supabase/server";
import type { JobPosting, NewJobPosting } from "@/lib/db/types";

const UNIQUE_VIOLATION = "23505";

export async function getJobPostingByUrl(url: string): Promise<JobPosting | null> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("job_postings")
    .select("*")
    .eq("url", url)
    .maybeSingle<JobPosting>();

  if (error) throw error;
  return data;
}

export async function getJobPostingById(id: string): Promise<JobPosting | null> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("job_postings")
    .select("*")
    .eq("id", id)
    .maybeSingle<JobPosting>();

  if (error) throw error;
  return data;
}

export async function listJobPostingsByIds(ids: string[]): Promise<JobPosting[]> {
  if (ids.length === 0) return [];
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("job_postings")
    .select("*")
    .in("id", ids)
    .returns<JobPosting[]>();

  if (error) throw error;
  return data ?? [];
}

export async function createJobPosting(row: NewJobPosting): Promise<JobPosting> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("job_postings")
    .insert(row)
    .select("*")
    .single<JobPosting>();

  if (error) throw error;
  return data;
}

/**
 * One row per URL. A concurrent insert of the same URL loses the unique
 * constraint race and reads the winner's row back.
 */
export async function getOrCreateJobPosting(
  row: NewJobPosting
): Promise<{ posting: JobPosting; created: boolean }> {
  const existing = await getJobPostingByUrl(row.url);
  if (existing) return { posting: existing, created: false };

  try {
    return { posting: await createJobPosting(row), created: true };
  } catch (err) {
    if (!isUniqueViolation(err)) throw err;
    const winner = await getJobPostingByUrl(row.url);
    if (!winner) throw err;
    return { posting: winner, created: false };
  }
}

export async function updateJobPosting(
  id: string,
  patch: Partial<NewJobPosting>
): Promise<JobPosting> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("job_postings")
    .update(patch)
    .eq("id", id)
    .select("*")
    .single<JobPosting>();

  if (error) throw error;
  return data;
}

export function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}
