/**
 * PHI Sanitizer Utility
 *
 * HIPAA Compliance: Ensures no Protected Health Information (PHI) is logged.
 *
 * PHI Exclusion Rules:
 * - ❌ Never log: document contents, OCR text, patient names, emails, addresses
 * - ✅ Always log: patientId, eventType, timestamp, success, stage
 * - ✅ Optional metadata: fileSize, extension, classification label (non-PHI metadata only)
 */

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE_PATTERN = /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;
const SSN_PATTERN = /\d{3}-\d{2}-\d{4}/g;

/**
 * Keys whose values may carry document content or identity and are never
 * written to the audit log.
 */
const PHI_METADATA_KEYS = new Set([
  'text',
  'ocrText',
  'extractedText',
  'content',
  'fileBuffer',
  'buffer',
  'patientName',
  'firstName',
  'lastName',
  'fullName',
]);

/**
 * Sanitize error messages to remove PHI and sensitive data
 *
 * Removes:
 * - Email addresses
 * - Tokens (Bearer tokens, API keys)
 * - SSN patterns
 * - Phone numbers
 * - Long numbers (potential medical record numbers)
 *
 * @returns Sanitized error message (max 500 chars)
 */
export function sanitizeErrorMessage(error: string): string {
  if (!error) {
    return '';
  }

  let sanitized = error;

  sanitized = sanitized.replace(EMAIL_PATTERN, '[EMAIL_REDACTED]');

  // Remove tokens
  sanitized = sanitized.replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]');
  sanitized = sanitized.replace(/token[:\s]+[^\s]+/gi, 'token: [REDACTED]');
  sanitized = sanitized.replace(
    /api[_-]?key[:\s]+[^\s]+/gi,
    'api_key: [REDACTED]',
  );

  // SSN before phone: the phone pattern also matches XXX-XX-XXXX prefixes
  sanitized = sanitized.replace(SSN_PATTERN, '[SSN_REDACTED]');
  sanitized = sanitized.replace(PHONE_PATTERN, '[PHONE_REDACTED]');

  sanitized = sanitized.replace(/\d{10,}/g, '[NUMBER_REDACTED]');

  return sanitized.substring(0, 500);
}

/**
 * Sanitize metadata object to remove PHI
 *
 * Drops content-bearing keys and string values that look like emails or
 * phone numbers. Nested objects and arrays are sanitized recursively.
 */
export function sanitizeMetadata(
  metadata: Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (!metadata) {
    return {};
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (PHI_METADATA_KEYS.has(key)) {
      continue;
    }
    const cleaned = sanitizeValue(value);
    if (cleaned !== undefined) {
      sanitized[key] = cleaned;
    }
  }

  return sanitized;
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return looksLikeContact(value) ? undefined : value;
  }
  if (Array.isArray(value)) {
    return value
      .map((item) => sanitizeValue(item))
      .filter((item) => item !== undefined);
  }
  if (isPlainObject(value)) {
    return sanitizeMetadata(value);
  }
  return value;
}

function looksLikeContact(value: string): boolean {
  return (
    new RegExp(EMAIL_PATTERN.source).test(value) ||
    new RegExp(PHONE_PATTERN.source).test(value)
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !Buffer.isBuffer(value)
  );
}
