import * as path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = path.resolve(__dirname, "../..");

/**
 * Returns the data directory path. Uses CLUB_DATA_DIR if set,
 * otherwise defaults to <PROJECT_ROOT>/data/.
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.CLUB_DATA_DIR || path.join(PROJECT_ROOT, "data");
}

export function getDefaultDatabasePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getDataDir(env), "club.db");
}
