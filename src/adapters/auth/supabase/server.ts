import { getSupabaseServiceRoleAdapter } from "@/adapters/supabase/server";
import { debugLog } from "@/lib/debug";
import type { CredentialResolver, ResolvedCredential } from "@/ports/auth";
import { AuthenticationError } from "@/server/chat/types";

class SupabaseCredentialResolver implements CredentialResolver {
  async resolve(token: string): Promise<ResolvedCredential> {
    const trimmed = token.trim();
    if (!trimmed) {
      throw new AuthenticationError("Missing bearer token.");
    }
    const client = getSupabaseServiceRoleAdapter().getAuthClient();
    const { data, error } = await client.auth.getUser(trimmed);
    if (error || !data.user) {
      debugLog("chat.auth", "token rejected", error?.message ?? "no user");
      throw new AuthenticationError("Invalid or expired token.", "invalid_token");
    }
    return { userId: data.user.id, email: data.user.email ?? null };
  }
}

export const supabaseCredentialResolver: CredentialResolver = new SupabaseCredentialResolver();
