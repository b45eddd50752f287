import { z } from 'zod';
import type { Attachment, AttachmentsPolicy, ContactPolicy, Importance } from '../types.js';
import { ValidationError } from './errors.js';
import { expandBraces } from './patterns.js';

const AGENT_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

export const MAX_PATTERN_LENGTH = 512;
export const MAX_SUBJECT_LENGTH = 512;
export const MAX_REASON_LENGTH = 512;
export const MAX_THREAD_ID_LENGTH = 128;
export const MAX_TTL_SECONDS = 10 * 365 * 86400;

export const contactPolicySchema = z.enum(['open', 'auto', 'contacts_only', 'block_all']);
export const attachmentsPolicySchema = z.enum(['auto', 'inline', 'file']);
export const importanceSchema = z.enum(['low', 'normal', 'high', 'urgent']);

export const attachmentSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('file'),
    id: z.string().min(1),
    path: z.string().min(1),
    media_type: z.string().min(1),
    bytes: z.number().int().nonnegative(),
    sha1: z.string().regex(/^[0-9a-f]{40}$/).optional(),
  }),
  z.object({
    kind: z.literal('inline'),
    id: z.string().min(1),
    media_type: z.string().min(1),
    data_uri: z.string().startsWith('data:'),
  }),
  z.object({
    kind: z.literal('link'),
    id: z.string().min(1),
    url: z.string().url(),
  }),
]);

const attachmentListSchema = z.array(attachmentSchema);

function describe(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate an attachment list supplied by a caller or read back from the store.
 * @throws ValidationError naming the offending entry
 */
export function parseAttachments(value: unknown): Attachment[] {
  const result = attachmentListSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid attachments: ${describe(result.error)}`, 'INVALID_ATTACHMENTS');
  }

  const ids = new Set<string>();
  for (const attachment of result.data) {
    if (ids.has(attachment.id)) {
      throw new ValidationError(`Duplicate attachment id: ${attachment.id}`, 'INVALID_ATTACHMENTS');
    }
    ids.add(attachment.id);
  }

  return result.data;
}

export function parseContactPolicy(value: string): ContactPolicy {
  const result = contactPolicySchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Invalid contact policy: ${value}. Use open, auto, contacts_only, or block_all`,
      'INVALID_CONTACT_POLICY'
    );
  }
  return result.data;
}

export function parseAttachmentsPolicy(value: string): AttachmentsPolicy {
  const result = attachmentsPolicySchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Invalid attachments policy: ${value}. Use auto, inline, or file`,
      'INVALID_ATTACHMENTS_POLICY'
    );
  }
  return result.data;
}

export function parseImportance(value: string): Importance {
  const result = importanceSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid importance: ${value}`, 'INVALID_IMPORTANCE');
  }
  return result.data;
}

export function isValidAgentName(name: string): boolean {
  return AGENT_NAME_RE.test(name);
}

export function assertAgentName(name: string): void {
  if (!isValidAgentName(name)) {
    throw new ValidationError(`Invalid agent name: ${name}`, 'INVALID_AGENT_NAME');
  }
}

export function assertPositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer: ${value}`, 'INVALID_INPUT', { field });
  }
}

/**
 * TTLs are whole, positive seconds, at most ten years.
 */
export function assertTtl(ttlSeconds: number): void {
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new ValidationError(`TTL must be a positive whole number of seconds: ${ttlSeconds}`, 'INVALID_TTL');
  }
  if (ttlSeconds > MAX_TTL_SECONDS) {
    throw new ValidationError(`TTL exceeds ${MAX_TTL_SECONDS} seconds: ${ttlSeconds}`, 'INVALID_TTL');
  }
}

/**
 * Check a normalized path pattern, brace expansion included.
 */
export function assertPathPattern(pattern: string): string {
  const trimmed = pattern.trim();
  if (trimmed.length === 0 || trimmed === '.' || trimmed === '/') {
    throw new ValidationError('Path pattern must name a path inside the project', 'INVALID_PATH_PATTERN');
  }
  if (trimmed.length > MAX_PATTERN_LENGTH) {
    throw new ValidationError(
      `Path pattern exceeds ${MAX_PATTERN_LENGTH} characters`,
      'INVALID_PATH_PATTERN'
    );
  }
  expandBraces(trimmed);
  return trimmed;
}

export function assertMaxLength(field: string, value: string, max: number): void {
  if (value.length > max) {
    throw new ValidationError(`${field} exceeds ${max} characters`, 'INVALID_INPUT', { field });
  }
}
