/**
 * Job names are `{yy}_{base}_{revision}` with alias `{base}{yy}`.
 *
 * Revisions run a..z, then a1..z1, a2..z2 and so on.
 */

export const BASE_NAME_MIN = 4;
export const BASE_NAME_MAX = 10;

export interface BaseNameCheck {
  valid: boolean;
  reason: string | null;
}

export interface JobName {
  jobName: string;
  jobAlias: string;
}

const REVISION_PATTERN = /^([a-z])(\d*)$/;

export function validateBaseName(base: string): BaseNameCheck {
  if (base.length < BASE_NAME_MIN) {
    return { valid: false, reason: `Base name must be at least ${BASE_NAME_MIN} characters` };
  }
  if (base.length > BASE_NAME_MAX) {
    return { valid: false, reason: `Base name must be at most ${BASE_NAME_MAX} characters` };
  }
  if (!/^[a-z0-9_]+$/.test(base)) {
    return { valid: false, reason: 'Base name may only contain lowercase letters, digits and underscores' };
  }
  if (!/^[a-z]/.test(base)) {
    return { valid: false, reason: 'Base name must start with a letter' };
  }
  if (!/[a-z]$/.test(base)) {
    return { valid: false, reason: 'Base name must end with a letter' };
  }
  if (base.includes('__')) {
    return { valid: false, reason: 'Base name may not contain consecutive underscores' };
  }
  return { valid: true, reason: null };
}

export function isRevision(token: string): boolean {
  return REVISION_PATTERN.test(token);
}

/**
 * Successor of a revision token. Empty or unrecognized input starts at `a`.
 */
export function nextRevision(current: string): string {
  const match = REVISION_PATTERN.exec(current);
  if (!match) return 'a';

  const [, letter, digits] = match;
  const cycle = digits ? Number(digits) : 0;
  if (letter === 'z') return `a${cycle + 1}`;
  return `${String.fromCharCode(letter.charCodeAt(0) + 1)}${digits}`;
}

/**
 * Sort key for revisions: every numbered cycle follows the previous one.
 */
export function revisionRank(token: string): number {
  const match = REVISION_PATTERN.exec(token);
  if (!match) return -1;
  const [, letter, digits] = match;
  const cycle = digits ? Number(digits) : 0;
  return cycle * 26 + (letter.charCodeAt(0) - 'a'.charCodeAt(0));
}

export function maxRevision(tokens: string[]): string {
  let best = '';
  let bestRank = -1;
  for (const token of tokens) {
    const rank = revisionRank(token);
    if (rank > bestRank) {
      best = token;
      bestRank = rank;
    }
  }
  return best;
}

export function shortYear(date: Date): string {
  return String(date.getFullYear() % 100).padStart(2, '0');
}

/**
 * Compose name and alias, or null when the base name is invalid.
 */
export function createName(base: string, revision: string, year: string): JobName | null {
  if (!validateBaseName(base).valid || !isRevision(revision)) return null;
  return {
    jobName: `${year}_${base}_${revision}`,
    jobAlias: `${base}${year}`,
  };
}

/**
 * Split a job name into its parts, or null when it does not follow the pattern.
 */
export function parseJobName(jobName: string): { year: string; base: string; revision: string } | null {
  const match = /^(\d{2})_([a-z0-9_]+)_([a-z]\d*)$/.exec(jobName);
  if (!match) return null;
  return { year: match[1], base: match[2], revision: match[3] };
}

/**
 * Lowercase, replace anything outside [a-z0-9_] with `_`, collapse and trim underscores.
 */
export function cleanJobName(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Case-insensitive dedup of a comma list, keeping the first spelling and order.
 */
export function dedupeTags(tags: string | string[]): string[] {
  const list = Array.isArray(tags) ? tags : tags.split(',');
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of list) {
    const tag = raw.trim();
    if (!tag) continue;
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(tag);
  }
  return result;
}

export function formatTags(tags: string | string[]): string {
  return dedupeTags(tags).join(', ');
}
