import { createClient } from "@/lib/supabase/server";
import type { Experience } from "@/lib/db/types";

export async function listExperiences(userId: string): Promise<Experience[]> {
  const supabase = await createClient();
  const { data, error } = await supabase
    .from("experiences")
    .select("*")
    .eq("user_id", userId)
    .returns<Experience[]>();

  if (error) throw error;
  return data ?? [];
}

export async function countExperiences(userId: string): Promise<number> {
  const supabase = await createClient();
  const { count, error } = await supabase
    .from("experiences")
    .select("id", { count: "exact", head: true })
    .eq("user_id", userId);

  if (error) throw error;
  return count ?? 0;
}
