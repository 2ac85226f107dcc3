/**
 * Identity verification: bearer token → active user.
 * Shared by the REST preHandler and the WebSocket handshake.
 */

import type { UserStore } from './users';
import { verifyToken, isAccessToken, subjectToUserId } from './jwt';

export interface AuthUser {
  id: number;
  email: string;
  username: string;
  isSuperuser: boolean;
}

export interface IdentityVerifier {
  /** Resolves null for a missing, invalid or expired token, or an unknown or inactive user. */
  verify(token: string | null | undefined): Promise<AuthUser | null>;
}

export function createIdentityVerifier(users: UserStore): IdentityVerifier {
  return {
    async verify(token) {
      if (!token) return null;

      const payload = verifyToken(token);
      if (!payload || !isAccessToken(payload)) return null;

      const userId = subjectToUserId(payload.sub);
      if (userId === null) return null;

      const user = await users.findById(userId);
      if (!user || !user.isActive) return null;

      return {
        id: user.id,
        email: user.email,
        username: user.username,
        isSuperuser: user.isSuperuser,
      };
    },
  };
}
