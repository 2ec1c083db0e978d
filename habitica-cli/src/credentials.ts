import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import type { Credentials } from './types.js';
import { trimmed } from './utils.js';

export const AUTH_FILE_NAME = 'auth.json';

const CredentialsSchema = z.object({
  url: z.string().trim().url(),
  userId: z.string().trim().min(1),
  apiKey: z.string().trim().min(1),
});

/**
 * Loads `{url, userId, apiKey}` from `<configDir>/auth.json`.
 * HABITICA_URL, HABITICA_USER_ID and HABITICA_API_KEY override the file,
 * and the file may be absent when all three are set.
 */
export function loadCredentials(configDir: string, env: NodeJS.ProcessEnv = process.env): Credentials {
  const filePath = path.join(configDir, AUTH_FILE_NAME);
  const fromEnv = {
    url: trimmed(env.HABITICA_URL) || undefined,
    userId: trimmed(env.HABITICA_USER_ID) || undefined,
    apiKey: trimmed(env.HABITICA_API_KEY) || undefined,
  };

  let fromFile: Record<string, unknown> = {};
  if (fs.existsSync(filePath)) {
    fromFile = readAuthFile(filePath);
  } else if (!fromEnv.url || !fromEnv.userId || !fromEnv.apiKey) {
    throw new ConfigError(`Unable to find '${filePath}'.`);
  }

  const merged = {
    url: fromEnv.url ?? fromFile.url,
    userId: fromEnv.userId ?? fromFile.userId,
    apiKey: fromEnv.apiKey ?? fromFile.apiKey,
  };
  const parsed = CredentialsSchema.safeParse(merged);
  if (!parsed.success) {
    const fields = Array.from(new Set(parsed.error.issues.map((issue) => issue.path.join('.'))));
    throw new ConfigError(`Missing or invalid option in auth file '${filePath}': ${fields.join(', ')}`);
  }
  return { ...parsed.data, url: parsed.data.url.replace(/\/+$/, '') };
}

function readAuthFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Unable to read '${filePath}': ${errorMessage(err)}`, { cause: err });
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`'${filePath}' must contain a JSON object`);
  }
  return { ...parsed };
}
