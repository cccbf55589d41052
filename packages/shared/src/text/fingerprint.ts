/**
 * Content fingerprints
 *
 * A record's identity across re-extractions. Derived from the raw text only,
 * so improving an extractor never invalidates review decisions keyed on it.
 */

import crypto from 'crypto';

export const FINGERPRINT_PATTERN = /^[0-9a-f]{40}$/;

/**
 * SHA-1 hex digest of the UTF-8 bytes of the trimmed text.
 */
export function fingerprint(rawText: string): string {
  return crypto.createHash('sha1').update(rawText.trim(), 'utf8').digest('hex');
}
