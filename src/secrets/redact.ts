import type { SecretBundle } from "../types/secrets.js";

const MASK = "***";

/**
 * Redact sensitive information from a message: every value of the bundle,
 * its base64 form, and common `key=value` credential pairs.
 */
export function redactSensitiveInfo(s: string, secrets?: SecretBundle): string {
  if (!s) return "";

  let result = s;

  if (secrets) {
    // Longest first so a value containing another value is masked whole.
    const values = Object.values(secrets)
      .filter((v) => v.length > 0)
      .flatMap((v) => [v, Buffer.from(v, "utf8").toString("base64")])
      .sort((a, b) => b.length - a.length);
    for (const value of values) {
      result = result.split(value).join(MASK);
    }
  }

  result = result.replace(/password[=:]\s*\S+/gi, `password=${MASK}`);
  result = result.replace(/token[=:]\s*\S+/gi, `token=${MASK}`);
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, `api_key=${MASK}`);
  result = result.replace(/secret[=:]\s*\S+/gi, `secret=${MASK}`);

  return result;
}

/** Strip line breaks so one diagnostic stays one log line. */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

export type Redactor = (s: string) => string;
