import type { ServiceContext } from "../context.js";
import { getActiveUser, updateUserTokens } from "../db/users.js";
import type { UserRecord } from "../types/index.js";
import { UserNotFoundError } from "../utils/errors.js";
import { toEpochSeconds } from "../utils/weeks.js";

export const TOKEN_EXPIRY_BUFFER_SECONDS = 300;

export function needsRefresh(user: Pick<UserRecord, "token_expires_at">, now: Date): boolean {
  return user.token_expires_at <= toEpochSeconds(now) + TOKEN_EXPIRY_BUFFER_SECONDS;
}

/**
 * Returns the user unchanged while the access token has more than five minutes
 * left; otherwise exchanges the stored refresh token and persists the new
 * credentials. Concurrent refreshes of one user are last-writer-wins.
 */
export async function refreshUserToken(ctx: ServiceContext, user: UserRecord): Promise<UserRecord> {
  if (!needsRefresh(user, ctx.clock.now())) {
    return user;
  }

  ctx.logger.info(`Refreshing token for user ${user.id} (${user.firstname ?? "unknown"})`);
  const tokens = await ctx.strava.refreshToken(user.refresh_token);
  updateUserTokens(ctx.db, user.id, tokens);

  const updated = getActiveUser(ctx.db, user.id);
  if (!updated) {
    throw new UserNotFoundError(user.id);
  }
  return updated;
}
