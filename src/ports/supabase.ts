import type { SupabaseClient } from "@supabase/supabase-js";

export interface SupabaseServerAdapter {
  vendor: string;
  getServiceRoleClient(): SupabaseClient;
  /** Client for verifying end-user access tokens; falls back to the service role key. */
  getAuthClient(): SupabaseClient;
}
