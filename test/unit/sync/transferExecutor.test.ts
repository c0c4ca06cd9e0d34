import { expect } from 'chai';
import { promises as fs } from 'fs';
import path from 'path';
import { TransferExecutor, classifyTransferError } from '../../../src/sync/TransferExecutor.js';
import { PlannedItem, TransferPlan } from '../../../src/sync/types.js';
import {
  CodedError,
  InMemoryChannel,
  REMOTE_ROOT,
  makeTempDir,
  removeDir,
  writeLocalFiles
} from '../../helpers/fakes.js';

function uploadPlan(paths: string[]): TransferPlan {
  return {
    direction: 'push',
    items: paths.map((relativePath): PlannedItem => ({ relativePath, action: 'upload' })),
    advisories: []
  };
}

describe('TransferExecutor', () => {
  const FILES = ['a.txt', 'b.txt', 'c.txt', 'd.txt', 'e.txt'];
  let root: string;
  let channel: InMemoryChannel;
  let executor: TransferExecutor;

  beforeEach(async () => {
    root = await makeTempDir();
    channel = new InMemoryChannel();
    executor = new TransferExecutor();
    await writeLocalFiles(root, {
      'a.txt': 'aa',
      'b.txt': 'bbb',
      'c.txt': 'cccc',
      'd.txt': 'ddddd',
      'e.txt': 'eeeeee'
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('keeps going after a failed item and reports it', async () => {
    channel.failOn(`${REMOTE_ROOT}/c.txt`, 'put', new CodedError('Failure', 4));

    const outcome = await executor.execute(uploadPlan(FILES), channel, { localRoot: root, remoteRoot: REMOTE_ROOT });

    expect(outcome.itemsAttempted).to.equal(5);
    expect(outcome.itemsTransferred).to.equal(4);
    expect(outcome.itemsFailed).to.equal(1);
    expect(outcome.succeeded).to.be.false;
    expect(outcome.cancelled).to.be.false;
    expect(outcome.bytesTransferred).to.equal(2 + 3 + 5 + 6);
    expect(outcome.failures).to.deep.equal([{ path: 'c.txt', kind: 'io', message: 'Failure' }]);
    expect(channel.operations).to.deep.equal(FILES.map(file => `put ${REMOTE_ROOT}/${file}`));
  });

  it('stops between items when cancelled', async () => {
    const controller = new AbortController();
    let puts = 0;
    channel.afterTransfer = () => {
      puts++;
      if (puts === 2) {
        controller.abort();
      }
    };

    const outcome = await executor.execute(uploadPlan(FILES), channel, {
      localRoot: root,
      remoteRoot: REMOTE_ROOT,
      signal: controller.signal
    });

    expect(outcome.cancelled).to.be.true;
    expect(outcome.succeeded).to.be.false;
    expect(outcome.itemsAttempted).to.equal(2);
    expect(outcome.itemsTransferred).to.equal(2);
    expect(outcome.unattemptedPaths).to.deep.equal(['c.txt', 'd.txt', 'e.txt']);
    expect(channel.files.has(`${REMOTE_ROOT}/c.txt`)).to.be.false;
  });

  it('succeeds trivially on an empty plan', async () => {
    const outcome = await executor.execute(uploadPlan([]), channel, { localRoot: root, remoteRoot: REMOTE_ROOT });

    expect(outcome.succeeded).to.be.true;
    expect(outcome.itemsAttempted).to.equal(0);
    expect(channel.operations).to.deep.equal([]);
  });

  it('creates remote parent directories and copies the local mode', async () => {
    await writeLocalFiles(root, { 'wp-content/themes/site/style.css': 'body{}' });
    await fs.chmod(path.join(root, 'wp-content', 'themes', 'site', 'style.css'), 0o640);

    const outcome = await executor.execute(uploadPlan(['wp-content/themes/site/style.css']), channel, {
      localRoot: root,
      remoteRoot: REMOTE_ROOT
    });

    expect(outcome.succeeded).to.be.true;
    expect(channel.dirs.has(`${REMOTE_ROOT}/wp-content/themes/site`)).to.be.true;
    expect(channel.modes.get(`${REMOTE_ROOT}/wp-content/themes/site/style.css`)).to.equal(0o640);
  });

  it('records a refused chmod as a note, not a failure', async () => {
    await fs.chmod(path.join(root, 'a.txt'), 0o640);
    channel.failOn(`${REMOTE_ROOT}/a.txt`, 'chmod', new Error('Operation unsupported'));

    const outcome = await executor.execute(uploadPlan(['a.txt']), channel, { localRoot: root, remoteRoot: REMOTE_ROOT });

    expect(outcome.succeeded).to.be.true;
    expect(outcome.itemsTransferred).to.equal(1);
    expect(outcome.notes).to.deep.equal(['a.txt: permissions 640 not applied (Operation unsupported)']);
  });

  it('fails an upload whose local file is gone as not_found', async () => {
    const outcome = await executor.execute(uploadPlan(['missing.txt']), channel, { localRoot: root, remoteRoot: REMOTE_ROOT });

    expect(outcome.itemsFailed).to.equal(1);
    expect(outcome.failures[0].kind).to.equal('not_found');
  });

  it('downloads into new local directories', async () => {
    channel.addFile(`${REMOTE_ROOT}/uploads/2024/photo.jpg`, 'jpegdata', 1000);
    const plan: TransferPlan = {
      direction: 'pull',
      items: [{ relativePath: 'uploads/2024/photo.jpg', action: 'download', size: 8, modifiedAt: 1000 }],
      advisories: []
    };

    const outcome = await executor.execute(plan, channel, { localRoot: root, remoteRoot: REMOTE_ROOT });

    expect(outcome.bytesTransferred).to.equal(8);
    expect(await fs.readFile(path.join(root, 'uploads', '2024', 'photo.jpg'), 'utf-8')).to.equal('jpegdata');
  });

  it('removes remote files for delete items', async () => {
    channel.addFile(`${REMOTE_ROOT}/old.php`, 'x', 1);
    const plan: TransferPlan = {
      direction: 'push',
      items: [
        { relativePath: 'old.php', action: 'delete' },
        { relativePath: 'never-there.php', action: 'delete' }
      ],
      advisories: []
    };

    const outcome = await executor.execute(plan, channel, { localRoot: root, remoteRoot: REMOTE_ROOT });

    expect(channel.files.has(`${REMOTE_ROOT}/old.php`)).to.be.false;
    expect(outcome.itemsTransferred).to.equal(1);
    expect(outcome.failures).to.deep.equal([
      { path: 'never-there.php', kind: 'not_found', message: `No such file: ${REMOTE_ROOT}/never-there.php` }
    ]);
  });

  it('reports progress once per item with a rising count', async () => {
    const calls: Array<[number, number, string]> = [];
    channel.failOn(`${REMOTE_ROOT}/b.txt`, 'put', new Error('boom'));

    await executor.execute(uploadPlan(FILES), channel, {
      localRoot: root,
      remoteRoot: REMOTE_ROOT,
      onProgress: (current, total, message) => {
        calls.push([current, total, message]);
      }
    });

    expect(calls).to.deep.equal([
      [1, 5, 'a.txt'],
      [2, 5, 'b.txt'],
      [3, 5, 'c.txt'],
      [4, 5, 'd.txt'],
      [5, 5, 'e.txt']
    ]);
  });

  it('is not disturbed by a failing progress sink', async () => {
    const outcome = await executor.execute(uploadPlan(['a.txt']), channel, {
      localRoot: root,
      remoteRoot: REMOTE_ROOT,
      onProgress: () => Promise.reject(new Error('client went away'))
    });

    expect(outcome.succeeded).to.be.true;
  });

  describe('classifyTransferError', () => {
    it('maps node and SFTP codes', () => {
      expect(classifyTransferError(new CodedError('x', 'EACCES'))).to.equal('permission');
      expect(classifyTransferError(new CodedError('x', 3))).to.equal('permission');
      expect(classifyTransferError(new CodedError('x', 'ENOENT'))).to.equal('not_found');
      expect(classifyTransferError(new CodedError('x', 'ECONNRESET'))).to.equal('connection');
    });

    it('falls back to the message, then io', () => {
      expect(classifyTransferError(new Error('put: No such file or directory'))).to.equal('not_found');
      expect(classifyTransferError(new Error('Connection lost before handshake'))).to.equal('connection');
      expect(classifyTransferError('weird')).to.equal('io');
    });
  });
});
