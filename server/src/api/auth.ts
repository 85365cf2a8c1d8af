/**
 * Soft authentication for realtime connections
 *
 * A token that is missing, malformed, expired or signed with the wrong key
 * never rejects the connection: the client continues as a guest.
 */

import jwt from "jsonwebtoken";
import type { ServerConfig } from "../config/index.js";

export interface ClientIdentity {
  userId: string | null;
  username: string;
  authenticated: boolean;
}

export const GUEST_USERNAME = "guest";

export function guestIdentity(): ClientIdentity {
  return { userId: null, username: GUEST_USERNAME, authenticated: false };
}

/**
 * Read the `token` query parameter from a request URL
 */
export function extractToken(url: string | undefined): string | null {
  if (!url) return null;
  try {
    const token = new URL(url, "http://localhost").searchParams.get("token");
    return token && token.length > 0 ? token : null;
  } catch {
    return null;
  }
}

export function resolveIdentity(
  token: string | null,
  auth: ServerConfig["auth"],
): ClientIdentity {
  if (!token) {
    return guestIdentity();
  }

  try {
    const payload = jwt.verify(token, auth.jwtSecret, {
      algorithms: [auth.algorithm],
    });
    if (typeof payload === "string" || !payload.sub) {
      console.warn("[Auth] Token has no subject, continuing as guest");
      return guestIdentity();
    }

    const username: unknown = payload.username;
    return {
      userId: payload.sub,
      username:
        typeof username === "string" && username.length > 0
          ? username
          : payload.sub,
      authenticated: true,
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[Auth] Token rejected (${reason}), continuing as guest`);
    return guestIdentity();
  }
}
