/**
 * Optional Fernet-encrypted database credentials. With FERNET_KEY set, each
 * *_ENCRYPTED variable is decrypted into its plain counterpart, which psql
 * and pg both read from the environment.
 */

import { Fernet } from "fernet-nodejs";
import { errorMessage } from "../../core/domain/errors.js";

const ENCRYPTED_VARS: [string, string][] = [
  ["PGPASSWORD_ENCRYPTED", "PGPASSWORD"],
  ["DATABASE_URL_ENCRYPTED", "DATABASE_URL"],
];

/** Returns one warning per variable that could not be decrypted. */
export function loadSecrets(env: NodeJS.ProcessEnv = process.env): string[] {
  const key = env.FERNET_KEY?.trim();
  if (!key) return [];

  const warnings: string[] = [];
  let fernet: Fernet;
  try {
    fernet = new Fernet(key);
  } catch (e) {
    return [`FERNET_KEY is not a valid Fernet key: ${errorMessage(e)}`];
  }
  for (const [encKey, plainKey] of ENCRYPTED_VARS) {
    const encrypted = env[encKey]?.trim();
    if (!encrypted) continue;
    try {
      const decrypted = fernet.decrypt(encrypted);
      env[plainKey] =
        typeof decrypted === "string" ? decrypted : String(decrypted);
    } catch (e) {
      warnings.push(`Could not decrypt ${encKey}: ${errorMessage(e)}`);
    }
  }
  return warnings;
}
