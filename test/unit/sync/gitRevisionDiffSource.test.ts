import { expect } from 'chai';
import { spawnSync } from 'child_process';
import { promises as fs } from 'fs';
import path from 'path';
import { GitRevisionDiffSource, parseRawDiff } from '../../../src/sync/RevisionDiffSource.js';
import { RevisionSourceError } from '../../../src/errors/syncErrors.js';
import { GitCommandError, execGitCommand, splitNul } from '../../../src/utils/gitCommands.js';
import { makeTempDir, rejectionOf, removeDir, writeLocalFiles } from '../../helpers/fakes.js';

function git(cwd: string, ...args: string[]): string {
  const result = spawnSync('git', ['-c', 'user.name=Test', '-c', 'user.email=test@example.test', ...args], {
    cwd,
    encoding: 'utf-8'
  });
  if (result.status !== 0) {
    throw new Error(`git ${args.join(' ')} failed: ${result.stderr}`);
  }
  return result.stdout.trim();
}

const gitAvailable = spawnSync('git', ['--version']).status === 0;

describe('GitRevisionDiffSource', function () {
  let repo: string;
  let first: string;
  let second: string;

  before(function () {
    if (!gitAvailable) {
      this.skip();
    }
  });

  beforeEach(async () => {
    repo = await makeTempDir('site-sync-repo-');
    git(repo, 'init', '-q');
    await writeLocalFiles(repo, { 'a.txt': 'one', 'sub/b.txt': 'b', 'sub/keep.txt': 'k' });
    git(repo, 'add', '.');
    git(repo, 'commit', '-q', '-m', 'first');
    first = git(repo, 'rev-parse', 'HEAD');

    await writeLocalFiles(repo, { 'a.txt': 'two', 'c.txt': 'new' });
    git(repo, 'rm', '-q', 'sub/b.txt');
    git(repo, 'add', '.');
    git(repo, 'commit', '-q', '-m', 'second');
    second = git(repo, 'rev-parse', 'HEAD');
  });

  afterEach(async () => {
    await removeDir(repo);
  });

  it('reads the checked-out revision and its summary', async () => {
    const source = new GitRevisionDiffSource(repo);

    expect(await source.currentRevision()).to.equal(second);
    expect(await source.revisionSummary(second)).to.equal('second');
  });

  it('lists tracked files at a revision', async () => {
    const source = new GitRevisionDiffSource(repo);

    expect(await source.allTrackedFiles(first)).to.deep.equal(['a.txt', 'sub/b.txt', 'sub/keep.txt']);
    expect(await source.allTrackedFiles()).to.deep.equal(['a.txt', 'c.txt', 'sub/keep.txt']);
  });

  it('separates changed files from deleted ones', async () => {
    const source = new GitRevisionDiffSource(repo);

    expect(await source.changedFiles(first, second)).to.deep.equal(['a.txt', 'c.txt']);
    expect(await source.deletedFiles(first, second)).to.deep.equal(['sub/b.txt']);
  });

  it('reports paths relative to a site in a subdirectory', async () => {
    const source = new GitRevisionDiffSource(path.join(repo, 'sub'));

    expect(await source.allTrackedFiles(first)).to.deep.equal(['b.txt', 'keep.txt']);
    expect(await source.changedFiles(first, second)).to.deep.equal([]);
    expect(await source.deletedFiles(first, second)).to.deep.equal(['b.txt']);
  });

  it('leaves submodule gitlinks out of tracked, changed and deleted files', async () => {
    git(repo, 'update-index', '--add', '--cacheinfo', `160000,${first},plugins/vendor-lib`);
    git(repo, 'commit', '-q', '-m', 'add submodule');
    const withLink = git(repo, 'rev-parse', 'HEAD');
    git(repo, 'rm', '-q', '--cached', 'plugins/vendor-lib');
    git(repo, 'commit', '-q', '-m', 'drop submodule');
    const withoutLink = git(repo, 'rev-parse', 'HEAD');
    const source = new GitRevisionDiffSource(repo);

    expect(await source.allTrackedFiles(withLink)).to.deep.equal(['a.txt', 'c.txt', 'sub/keep.txt']);
    expect(await source.changedFiles(second, withLink)).to.deep.equal([]);
    expect(await source.deletedFiles(withLink, withoutLink)).to.deep.equal([]);
  });

  it('flags a revision that no longer exists', async () => {
    const source = new GitRevisionDiffSource(repo);

    const error = await rejectionOf(source.changedFiles('0'.repeat(40), second));

    expect(error).to.be.instanceOf(RevisionSourceError);
    expect(error).to.have.property('reason', 'UNKNOWN_REVISION');
  });

  it('flags a missing local root', async () => {
    const source = new GitRevisionDiffSource(path.join(repo, 'nope'));

    const error = await rejectionOf(source.currentRevision());

    expect(error).to.be.instanceOf(RevisionSourceError);
    expect(error).to.have.property('reason', 'NOT_A_REPOSITORY');
  });

  it('flags a directory outside any repository', async () => {
    const plain = await makeTempDir('site-sync-plain-');
    try {
      await fs.writeFile(path.join(plain, 'index.html'), '<p>hi</p>');
      const error = await rejectionOf(new GitRevisionDiffSource(plain).currentRevision());
      expect(error).to.have.property('reason', 'NOT_A_REPOSITORY');
    } finally {
      await removeDir(plain);
    }
  });

  describe('gitCommands', () => {
    it('throws GitCommandError with the exit code', async () => {
      const error = await rejectionOf(execGitCommand(['rev-parse', '--verify', 'no-such-ref'], repo));

      expect(error).to.be.instanceOf(GitCommandError);
      expect(error).to.have.property('exitCode', 128);
    });

    it('parses raw diff records', () => {
      const output = ':100644 100644 1111111 2222222 M\0a b.txt\0:000000 160000 0000000 3333333 A\0vendor\0';

      expect(parseRawDiff(output)).to.deep.equal([
        { oldMode: '100644', newMode: '100644', path: 'a b.txt' },
        { oldMode: '000000', newMode: '160000', path: 'vendor' }
      ]);
      expect(parseRawDiff('')).to.deep.equal([]);
    });

    it('splits NUL-separated output', () => {
      expect(splitNul('a.txt\0dir/b c.txt\0')).to.deep.equal(['a.txt', 'dir/b c.txt']);
    });
  });
});
