import { supabaseCredentialResolver } from "@/adapters/auth/supabase/server";
import { serverEnv } from "@/lib/env/server";
import type { CredentialResolver } from "@/ports/auth";

const authVendor = serverEnv.AUTH_VENDOR;

let resolver: CredentialResolver;

switch (authVendor) {
  case "supabase":
  case "":
    resolver = supabaseCredentialResolver;
    break;
  default:
    console.warn("auth.vendor.unknown", { vendor: authVendor, fallback: "supabase" });
    resolver = supabaseCredentialResolver;
}

export function getCredentialResolver(): CredentialResolver {
  return resolver;
}

export function getAuthServerVendor(): string {
  return authVendor;
}
