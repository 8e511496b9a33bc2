// Server-side storage client. Never expose the service role key to a browser.
import { createClient as createSupabaseClient, type SupabaseClient } from "@supabase/supabase-js";
import { getConfig } from "@/lib/config";

let client: SupabaseClient | undefined;

export async function createClient(): Promise<SupabaseClient> {
  if (client) return client;
  const { url, serviceRoleKey } = getConfig().supabase;
  if (!url || !serviceRoleKey) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set");
  }
  client = createSupabaseClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
