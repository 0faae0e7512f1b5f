import type { Context, Next } from "hono";
import { supabaseAdmin } from "../services/supabase.js";

export type AuthVariables = {
  userId: string | null;
  email: string | null;
};

interface VerifiedUser {
  id: string;
  email: string | null;
}

async function verifyBearerToken(authHeader: string): Promise<VerifiedUser | null> {
  const token = authHeader.slice(7);

  const {
    data: { user },
    error,
  } = await supabaseAdmin.auth.getUser(token);

  if (error || !user) {
    return null;
  }
  return { id: user.id, email: user.email ?? null };
}

/**
 * Resolve the caller from a Supabase bearer token. A request without an
 * Authorization header continues as a guest (userId null); a bad token is rejected.
 */
export async function optionalAuthMiddleware(
  c: Context<{ Variables: AuthVariables }>,
  next: Next
) {
  const authHeader = c.req.header("Authorization");

  if (!authHeader) {
    c.set("userId", null);
    c.set("email", null);
    await next();
    return;
  }

  if (!authHeader.startsWith("Bearer ")) {
    return c.json({ error: "Missing or invalid Authorization header", code: "NOT_AUTHENTICATED" }, 401);
  }

  const user = await verifyBearerToken(authHeader);
  if (!user) {
    return c.json({ error: "Invalid or expired token", code: "NOT_AUTHENTICATED" }, 401);
  }

  c.set("userId", user.id);
  c.set("email", user.email);

  await next();
}
