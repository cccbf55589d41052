/**
 * Text Normalizer
 *
 * Cleans raw item text before any pattern matching: entity residue,
 * double-encoded UTF-8, exotic whitespace and decomposed accents.
 * Every function here is pure and never throws.
 */

import { decodeHTML } from 'entities';

/**
 * Windows-1252 characters in the 0x80-0x9F range, mapped back to their byte.
 * Text that went through a cp1252 decode of UTF-8 bytes contains these.
 */
const CP1252_BYTES: ReadonlyMap<number, number> = new Map([
  [0x20ac, 0x80], [0x201a, 0x82], [0x0192, 0x83], [0x201e, 0x84],
  [0x2026, 0x85], [0x2020, 0x86], [0x2021, 0x87], [0x02c6, 0x88],
  [0x2030, 0x89], [0x0160, 0x8a], [0x2039, 0x8b], [0x0152, 0x8c],
  [0x017d, 0x8e], [0x2018, 0x91], [0x2019, 0x92], [0x201c, 0x93],
  [0x201d, 0x94], [0x2022, 0x95], [0x2013, 0x96], [0x2014, 0x97],
  [0x02dc, 0x98], [0x2122, 0x99], [0x0161, 0x9a], [0x203a, 0x9b],
  [0x0153, 0x9c], [0x017e, 0x9e], [0x0178, 0x9f],
]);

/** Runs of characters that a latin-1 or cp1252 decode of UTF-8 bytes can produce. */
const MOJIBAKE_RUN =
  /[\u0080-\u00ff\u0152\u0153\u0160\u0161\u0178\u017d\u017e\u0192\u02c6\u02dc\u2013\u2014\u2018-\u201e\u2020-\u2022\u2026\u2030\u2039\u203a\u20ac\u2122]{2,}/g;

const MOJIBAKE_MARKER = /[\u00c3\u00c2\u00e2\u00f0\u00ef]/;

const MAX_REPAIR_PASSES = 2;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

function decodeStrictUtf8(bytes: Uint8Array): string | null {
  try {
    return strictUtf8.decode(bytes);
  } catch {
    return null;
  }
}

function encodeSingleByte(run: string): Uint8Array | null {
  const bytes = new Uint8Array(run.length);
  for (let i = 0; i < run.length; i++) {
    const code = run.charCodeAt(i);
    const byte = code <= 0xff ? code : CP1252_BYTES.get(code);
    if (byte === undefined) return null;
    bytes[i] = byte;
  }
  return bytes;
}

function repairRun(run: string): string {
  if (!MOJIBAKE_MARKER.test(run)) return run;
  const bytes = encodeSingleByte(run);
  if (!bytes) return run;
  return decodeStrictUtf8(bytes) ?? run;
}

/**
 * Repair UTF-8 text that was decoded as latin-1/cp1252 one or two times.
 * Only runs that re-decode as valid UTF-8 are replaced; correctly encoded
 * accents ("ção", "SÃO") never form a valid sequence and are kept.
 */
export function repairMojibake(text: string): string {
  let current = text;
  for (let pass = 0; pass < MAX_REPAIR_PASSES; pass++) {
    const next = current.replace(MOJIBAKE_RUN, repairRun);
    if (next === current) break;
    current = next;
  }
  return current;
}

/**
 * Decode file bytes as UTF-8. Files mixing UTF-8 with latin-1 bytes are
 * read as latin-1 and the UTF-8 runs repaired afterwards.
 */
export function decodeBytes(bytes: Uint8Array): string {
  const utf8 = decodeStrictUtf8(bytes);
  if (utf8 !== null) return utf8;
  return repairMojibake(Buffer.from(bytes).toString('latin1'));
}

/**
 * Decode a whole HTML export. The charset meta is rewritten to UTF-8 because
 * the exports often declare ISO-8859-1 while shipping UTF-8.
 */
export function decodeHtmlBytes(bytes: Uint8Array): string {
  return decodeBytes(bytes)
    .replace(/\r\n?/g, '\n')
    .replace(/<meta[^>]+charset=[^>]+>/gi, '<meta charset="utf-8">');
}

/**
 * Normalize raw text: decode entities, repair encoding, collapse whitespace
 * and compose accents (NFC).
 */
export function normalizeText(input: string | Uint8Array): string {
  const decoded = typeof input === 'string' ? input : decodeBytes(input);

  return repairMojibake(decodeHTML(decoded))
    .replace(/[\u200b-\u200d\ufeff]/g, '')
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, '')
    .replace(/[\u00a0\u1680\u2000-\u200a\u202f\u205f\u3000]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .normalize('NFC');
}

function stripAccents(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

/**
 * Accent-free, lower-case, single-spaced label used for category matching.
 */
export function normalizeLabel(text: string): string {
  return stripAccents(normalizeText(text))
    .toLowerCase()
    .replace(/[_:/]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Convert text to a URL-safe slug.
 *
 * Example: "Ana Lúcia Ferreira" -> "ana-lucia-ferreira"
 */
export function slugify(text: string): string {
  return stripAccents(normalizeText(text))
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
