/**
 * Raw credentials pulled off an inbound request. The HTTP layer decides
 * where they come from; the authenticator decides what they mean.
 */
export interface RequestCredentials {
  /** Value of the `session` cookie. */
  readonly sessionToken?: string;
  /** Value of the `Authorization` header. */
  readonly authorization?: string;
}

export interface AuthSession {
  readonly accountId: string;
}

export interface Authenticator {
  /** Resolves to null when there is no valid session. */
  authenticate(credentials: RequestCredentials): Promise<AuthSession | null>;
}
