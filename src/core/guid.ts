import crypto from 'crypto';

// Lowercase letters and numbers only (36 chars) - easier to type than mixed case
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';
const GUID_LENGTH = 8;

/**
 * Generate a short GUID with a prefix (e.g., prd-xxxxxxxx).
 * Uses lowercase alphanumeric characters for easy typing.
 */
export function generateGuid(prefix: string): string {
  const normalizedPrefix = prefix.endsWith('-') ? prefix.slice(0, -1) : prefix;
  const bytes = crypto.randomBytes(GUID_LENGTH);
  let id = '';

  for (let i = 0; i < GUID_LENGTH; i++) {
    id += ALPHABET[bytes[i] % ALPHABET.length];
  }

  return `${normalizedPrefix}-${id}`;
}

/**
 * Derive a URL-safe slug from a human key such as a repository path.
 * @example slugify("/Users/dev/Backend API") -> "users-dev-backend-api"
 */
export function slugify(humanKey: string): string {
  return humanKey
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
