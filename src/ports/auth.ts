export type ResolvedCredential = {
  userId: string;
  email: string | null;
};

export interface CredentialResolver {
  /** Rejects with AuthenticationError when the token is missing, expired or unknown. */
  resolve(token: string): Promise<ResolvedCredential>;
}
