import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load the first .env found in the working directory or its parent.
 * Variables already present in the process environment win.
 *
 * @returns the file that was loaded, if any
 */
export function loadEnv(cwd: string = process.cwd()): string | undefined {
  const candidates = [path.join(cwd, '.env'), path.join(cwd, '..', '.env')];

  const envPath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!envPath) return undefined;

  const result = dotenv.config({ path: envPath });
  if (result.error) {
    // logger is not configured yet at this point
    console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
  }
  return envPath;
}
