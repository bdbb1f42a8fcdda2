import { getSupabaseDatabaseAdapter } from "@/adapters/database/supabase/admin";
import type { DatabaseClient } from "@/ports/database";

let client: DatabaseClient | null = null;

/** Service-role client backing the durable chat store. */
export function getDatabaseAdminClient(): DatabaseClient {
  if (!client) {
    const adapter = getSupabaseDatabaseAdapter();
    client = adapter.getAdminClient();
    console.info("chat.database.ready", { vendor: adapter.getVendor() });
  }
  return client;
}
