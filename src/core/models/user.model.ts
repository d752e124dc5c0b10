export type UserRole = 'admin' | 'annotator';

export interface UserIdentity {
  username: string;
  role: UserRole;
}

export interface AuthError {
  message: string;
}

export type AuthResult =
  | { success: true; user: UserIdentity }
  | { success: false; error: AuthError };

/**
 * Credential verification supplied by the host application.
 */
export type Authenticate = (username: string, password: string) => Promise<AuthResult>;
