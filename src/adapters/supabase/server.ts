import { createClient, type SupabaseClient } from "@supabase/supabase-js";

import type { SupabaseServerAdapter } from "@/ports/supabase";
import { serverEnv } from "@/lib/env/server";

let serviceClient: SupabaseClient | null = null;
let authClient: SupabaseClient | null = null;

function createServerClient(key: string | null, label: string): SupabaseClient {
  if (!serverEnv.SUPABASE_URL || !key) {
    throw new Error(`Supabase ${label} environment variables are not configured`);
  }
  return createClient(serverEnv.SUPABASE_URL, key, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
}

class SupabaseServiceRoleAdapter implements SupabaseServerAdapter {
  vendor = "supabase";

  getServiceRoleClient(): SupabaseClient {
    if (!serviceClient) {
      serviceClient = createServerClient(serverEnv.SUPABASE_SERVICE_ROLE_KEY, "service role");
    }
    return serviceClient;
  }

  getAuthClient(): SupabaseClient {
    if (!authClient) {
      authClient = serverEnv.SUPABASE_ANON_KEY
        ? createServerClient(serverEnv.SUPABASE_ANON_KEY, "auth")
        : this.getServiceRoleClient();
    }
    return authClient;
  }
}

let cachedAdapter: SupabaseServerAdapter | null = null;

export function getSupabaseServiceRoleAdapter(): SupabaseServerAdapter {
  if (!cachedAdapter) {
    cachedAdapter = new SupabaseServiceRoleAdapter();
  }
  return cachedAdapter;
}
