/**
 * RevisionDiffSource - what changed in version control
 *
 * PushPlanner only talks to this interface. GitRevisionDiffSource backs it with
 * the git CLI, run inside the site's local root; all paths it returns are
 * relative to that directory, so a site may live in a subdirectory of a repo.
 */

import { promises as fs } from 'fs';
import { SiteProfile } from './types.js';
import { RevisionSourceError } from '../errors/syncErrors.js';
import { execGitCommand, GitCommandError, runGitCommand, splitNul } from '../utils/gitCommands.js';

export interface RevisionDiffSource {
  /** Revision currently checked out */
  currentRevision(): Promise<string>;

  /** Files added or modified between two revisions (deletions excluded) */
  changedFiles(fromRevision: string, toRevision: string): Promise<string[]>;

  /** Files deleted between two revisions */
  deletedFiles(fromRevision: string, toRevision: string): Promise<string[]>;

  /** Every tracked file at a revision (default: current) */
  allTrackedFiles(revision?: string): Promise<string[]>;

  /** One-line description of a revision, when the backend has one */
  revisionSummary(revision: string): Promise<string | undefined>;
}

export type RevisionSourceFactory = (profile: SiteProfile) => RevisionDiffSource;

const NOT_A_REPO = /not a git repository/i;
const UNKNOWN_REV = /unknown revision|bad revision|bad object|invalid object name|needed a single revision|ambiguous argument/i;

const GITLINK_MODE = '160000';

export interface RawDiffEntry {
  oldMode: string;
  newMode: string;
  path: string;
}

/**
 * Parse `git diff --raw -z`: each entry is ":<old mode> <new mode> <old sha>
 * <new sha> <status>" followed by the path, NUL-separated
 */
export function parseRawDiff(output: string): RawDiffEntry[] {
  const fields = output.split('\0');
  const entries: RawDiffEntry[] = [];
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const meta = fields[i];
    const filePath = fields[i + 1];
    if (!meta.startsWith(':') || filePath.length === 0) {
      break;
    }
    const [oldMode = '', newMode = ''] = meta.slice(1).split(' ');
    entries.push({ oldMode, newMode, path: filePath });
  }
  return entries;
}

export class GitRevisionDiffSource implements RevisionDiffSource {
  private repoChecked = false;

  constructor(private readonly repoPath: string) {}

  async currentRevision(): Promise<string> {
    const stdout = await this.git(['rev-parse', '--verify', 'HEAD']);
    return stdout.trim();
  }

  async changedFiles(fromRevision: string, toRevision: string): Promise<string[]> {
    const entries = await this.rawDiff(fromRevision, toRevision, 'ACMT');
    return entries.filter(entry => entry.newMode !== GITLINK_MODE).map(entry => entry.path);
  }

  async deletedFiles(fromRevision: string, toRevision: string): Promise<string[]> {
    const entries = await this.rawDiff(fromRevision, toRevision, 'D');
    return entries.filter(entry => entry.oldMode !== GITLINK_MODE).map(entry => entry.path);
  }

  /**
   * Blobs only: submodule gitlinks are directories on disk and are not transferred
   */
  async allTrackedFiles(revision: string = 'HEAD'): Promise<string[]> {
    await this.verifyRevision(revision);
    const stdout = await this.git(['ls-tree', '-r', '-z', revision]);
    const files: string[] = [];
    for (const record of splitNul(stdout)) {
      // <mode> SP <type> SP <object> TAB <path>
      const tab = record.indexOf('\t');
      if (tab < 0) {
        continue;
      }
      const [, type] = record.slice(0, tab).split(' ');
      if (type === 'blob') {
        files.push(record.slice(tab + 1));
      }
    }
    return files;
  }

  async revisionSummary(revision: string): Promise<string | undefined> {
    const stdout = await this.git(['log', '-1', '--format=%s', revision, '--']);
    const summary = stdout.trim();
    return summary.length > 0 ? summary : undefined;
  }

  private async rawDiff(fromRevision: string, toRevision: string, filter: string): Promise<RawDiffEntry[]> {
    await this.verifyRevision(fromRevision);
    await this.verifyRevision(toRevision);
    const stdout = await this.git([
      'diff', '--raw', '-z', '--no-renames', '--relative', `--diff-filter=${filter}`,
      fromRevision, toRevision, '--'
    ]);
    return parseRawDiff(stdout);
  }

  /**
   * Fail with UNKNOWN_REVISION before diffing against a commit that is gone
   * (e.g. history rewritten since the last push)
   */
  private async verifyRevision(revision: string): Promise<void> {
    await this.ensureRepository();
    const result = await runGitCommand(['rev-parse', '--verify', '--quiet', `${revision}^{commit}`], this.repoPath);
    if (result.code !== 0) {
      throw new RevisionSourceError(
        `Revision ${revision} does not exist in ${this.repoPath}`,
        'UNKNOWN_REVISION',
        this.repoPath
      );
    }
  }

  private async ensureRepository(): Promise<void> {
    if (this.repoChecked) {
      return;
    }

    const stat = await fs.stat(this.repoPath).catch(() => null);
    if (!stat || !stat.isDirectory()) {
      throw new RevisionSourceError(
        `Local root ${this.repoPath} does not exist or is not a directory`,
        'NOT_A_REPOSITORY',
        this.repoPath
      );
    }
    this.repoChecked = true;
  }

  private async git(args: string[]): Promise<string> {
    await this.ensureRepository();
    try {
      return await execGitCommand(args, this.repoPath);
    } catch (error) {
      throw this.classify(error);
    }
  }

  private classify(error: unknown): RevisionSourceError {
    if (error instanceof GitCommandError) {
      if (NOT_A_REPO.test(error.stderr)) {
        return new RevisionSourceError(`${this.repoPath} is not a git repository`, 'NOT_A_REPOSITORY', this.repoPath);
      }
      if (UNKNOWN_REV.test(error.stderr)) {
        return new RevisionSourceError(
          `No such revision in ${this.repoPath}: ${error.message}`,
          'UNKNOWN_REVISION',
          this.repoPath
        );
      }
      return new RevisionSourceError(`git ${error.args[0]} failed: ${error.message}`, 'GIT_FAILED', this.repoPath);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new RevisionSourceError(`Unable to run git: ${message}`, 'GIT_FAILED', this.repoPath);
  }
}

export const gitRevisionSourceFactory: RevisionSourceFactory = profile => new GitRevisionDiffSource(profile.localRoot);
