/**
 * Exclusion rules for site transfers.
 *
 * A rule is a shell glob (`*`, `?`, `[abc]`, `[!abc]`). A path is excluded when
 * any rule matches:
 *   1. the full relative path, or
 *   2. for rules ending in '/', a run of whole path segments, or
 *   3. the final path component alone.
 *
 * Rules form a union, so order never matters and adding a rule can only
 * exclude more. A glob that cannot be compiled (e.g. an unclosed '[') is
 * compared as a plain string instead of failing the whole rule set.
 *
 * Usage:
 * ```typescript
 * isExcluded('wp-content/debug.log', ['*.log']);            // true
 * isExcluded('theme/node_modules/x/index.js', ['node_modules/']); // true
 *
 * const matcher = await ExclusionMatcher.forSite(profile.localRoot, profile.exclusions);
 * const kept = matcher.filterPaths(paths);
 * ```
 */

import { promises as fs } from 'fs';
import path from 'path';
import ignore, { Ignore } from 'ignore';
import { ExclusionRuleSet } from '../sync/types.js';
import { errorCodeOf } from '../errors/syncErrors.js';
import { log } from './logger.js';

/** Optional gitignore-style file at the local root */
export const SYNC_IGNORE_FILE = '.syncignore';

/**
 * Starting rule set for new site profiles
 */
export const DEFAULT_EXCLUSIONS: ExclusionRuleSet = Object.freeze([
  '*.log',
  'wp-config.php',
  'wp-config-local.php',
  '.git/',
  'node_modules/',
  '.DS_Store',
  '.htaccess',
  '*.sql',
  '*.sql.gz',
  '.env',
  '.env.local'
]);

// null = malformed, compare literally
const compiledGlobs = new Map<string, RegExp | null>();

const REGEX_SPECIALS = /[.+^${}()|\\\/\]\[]/;

/**
 * Translate an fnmatch-style glob into an anchored RegExp.
 * '*' crosses '/' like fnmatch does. Returns null for malformed globs.
 */
function compileGlob(glob: string): RegExp | null {
  const cached = compiledGlobs.get(glob);
  if (cached !== undefined) {
    return cached;
  }

  let source = '';
  let malformed = false;

  for (let i = 0; i < glob.length && !malformed; i++) {
    const ch = glob[i];

    if (ch === '*') {
      source += '.*';
      while (glob[i + 1] === '*') i++;
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      let j = i + 1;
      if (glob[j] === '!') j++;
      if (glob[j] === ']') j++;
      while (j < glob.length && glob[j] !== ']') j++;

      if (j >= glob.length) {
        malformed = true;
        break;
      }

      let body = glob.slice(i + 1, j);
      const negate = body.startsWith('!');
      if (negate) body = body.slice(1);
      body = body.replace(/[\\\]\[^]/g, m => `\\${m}`);
      source += negate ? `[^${body}]` : `[${body}]`;
      i = j;
    } else {
      source += REGEX_SPECIALS.test(ch) ? `\\${ch}` : ch;
    }
  }

  let compiled: RegExp | null = null;
  if (!malformed) {
    try {
      compiled = new RegExp(`^${source}$`, 's');
    } catch {
      // invalid character range such as [z-a]
      compiled = null;
    }
  }

  compiledGlobs.set(glob, compiled);
  return compiled;
}

/**
 * False for globs that fall back to literal comparison
 */
export function isWellFormedGlob(glob: string): boolean {
  return compileGlob(glob) !== null;
}

function globMatches(glob: string, candidate: string): boolean {
  const regex = compileGlob(glob);
  return regex ? regex.test(candidate) : glob === candidate;
}

/**
 * Normalize to '/'-separated, without leading './' or '/'
 */
export function normalizeRelativePath(relativePath: string): string {
  return relativePath
    .replace(/\\/g, '/')
    .replace(/^(\.\/)+/, '')
    .replace(/^\/+/, '');
}

/**
 * Directory rule: the rule's segments appear as consecutive whole segments
 * of the path (each compared as a glob).
 */
function matchesDirectoryRule(rule: string, segments: string[]): boolean {
  const ruleSegments = rule.split('/').filter(part => part.length > 0);
  if (ruleSegments.length === 0) {
    return false;
  }

  for (let start = 0; start + ruleSegments.length <= segments.length; start++) {
    const window = segments.slice(start, start + ruleSegments.length);
    if (window.every((segment, idx) => globMatches(ruleSegments[idx], segment))) {
      return true;
    }
  }
  return false;
}

/**
 * Whether a relative path is excluded by any rule in the set.
 * Deterministic, side-effect free, never throws.
 */
export function isExcluded(relativePath: string, ruleSet: ExclusionRuleSet): boolean {
  if (ruleSet.length === 0) {
    return false;
  }

  const normalized = normalizeRelativePath(relativePath);
  const segments = normalized.split('/').filter(part => part.length > 0);
  const basename = segments.length > 0 ? segments[segments.length - 1] : normalized;

  for (const rawRule of ruleSet) {
    const rule = rawRule.replace(/\\/g, '/').trim();
    if (rule.length === 0) {
      continue;
    }

    if (globMatches(rule, normalized)) {
      return true;
    }

    if (rule.endsWith('/') && matchesDirectoryRule(rule, segments)) {
      return true;
    }

    if (globMatches(rule, basename)) {
      return true;
    }
  }

  return false;
}

/**
 * A site's rule set plus its optional `.syncignore` file
 */
export class ExclusionMatcher {
  constructor(
    readonly rules: ExclusionRuleSet,
    private readonly ignoreFile: Ignore | null = null
  ) {}

  /**
   * Build a matcher for a site, reading `.syncignore` from the local root if present
   */
  static async forSite(localRoot: string, rules: ExclusionRuleSet): Promise<ExclusionMatcher> {
    return new ExclusionMatcher(rules, await ExclusionMatcher.loadIgnoreFile(localRoot));
  }

  static async loadIgnoreFile(localRoot: string): Promise<Ignore | null> {
    const ignorePath = path.join(localRoot, SYNC_IGNORE_FILE);
    try {
      const content = await fs.readFile(ignorePath, 'utf-8');
      log.debug(`[EXCLUDE] Loaded ${ignorePath}`);
      return ignore().add(content);
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT' || errorCodeOf(error) === 'ENOTDIR') {
        return null;
      }
      throw error;
    }
  }

  isExcluded(relativePath: string): boolean {
    if (isExcluded(relativePath, this.rules)) {
      return true;
    }

    if (this.ignoreFile) {
      const normalized = normalizeRelativePath(relativePath);
      // ignore() rejects empty and parent-relative paths
      if (normalized.length > 0 && !normalized.startsWith('../')) {
        return this.ignoreFile.ignores(normalized);
      }
    }
    return false;
  }

  filterPaths(paths: Iterable<string>): string[] {
    const kept: string[] = [];
    for (const candidate of paths) {
      if (!this.isExcluded(candidate)) {
        kept.push(candidate);
      }
    }
    return kept;
  }
}
