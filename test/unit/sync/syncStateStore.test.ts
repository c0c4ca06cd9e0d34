import { expect } from 'chai';
import { promises as fs } from 'fs';
import path from 'path';
import { STATE_FILE_NAME, SyncStateStore } from '../../../src/sync/SyncStateStore.js';
import { StateStoreError } from '../../../src/errors/syncErrors.js';
import { OperationOutcome } from '../../../src/sync/types.js';
import { emptyOutcome } from '../../../src/sync/operationSupport.js';
import { makeTempDir, pushRecord, rejectionOf, removeDir } from '../../helpers/fakes.js';

function outcomeWith(overrides: Partial<OperationOutcome>): OperationOutcome {
  return { ...emptyOutcome(), finishedAt: '2024-05-01T12:30:00.000Z', ...overrides };
}

describe('SyncStateStore', () => {
  let dir: string;
  let store: SyncStateStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new SyncStateStore(path.join(dir, 'state'));
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('treats a missing file as empty state', async () => {
    expect(await store.getSiteState('blog')).to.deep.equal({});
    expect(await store.getPushState('blog')).to.be.undefined;
  });

  it('persists push records across instances', async () => {
    const record = pushRecord('abc123', ['a.php']);
    await store.recordPush('blog', record);

    const reopened = new SyncStateStore(path.join(dir, 'state'));
    const loaded = await reopened.getPushState('blog');

    expect(loaded).to.deep.equal({ ...record, revisionSummary: undefined });
  });

  it('writes the file readable by the owner only', async () => {
    await store.recordPush('blog', pushRecord('abc123'));

    const stat = await fs.stat(store.getPath());
    expect(stat.mode & 0o777).to.equal(0o600);
    expect(path.basename(store.getPath())).to.equal(STATE_FILE_NAME);
  });

  it('keeps the last pull when a push is recorded', async () => {
    const pull = SyncStateStore.createPullRecord(
      new Date('2024-05-01T00:00:00Z'),
      new Date('2024-05-02T00:00:00Z'),
      outcomeWith({ itemsAttempted: 1, itemsTransferred: 1, bytesTransferred: 12 })
    );
    await store.recordPull('blog', pull);
    await store.recordPush('blog', pushRecord('abc123'));

    const state = await store.getSiteState('blog');
    expect(state.lastPull).to.deep.equal(pull);
    expect(state.lastPush?.revisionId).to.equal('abc123');
  });

  it('serializes concurrent writes', async () => {
    await Promise.all([
      store.recordPush('blog', pushRecord('r1')),
      store.recordPush('shop', pushRecord('r2')),
      store.recordPush('docs', pushRecord('r3'))
    ]);

    expect((await store.getPushState('blog'))?.revisionId).to.equal('r1');
    expect((await store.getPushState('shop'))?.revisionId).to.equal('r2');
    expect((await store.getPushState('docs'))?.revisionId).to.equal('r3');
  });

  it('rejects a corrupt file with StateStoreError', async () => {
    await fs.mkdir(path.dirname(store.getPath()), { recursive: true });
    await fs.writeFile(store.getPath(), '{ not json');

    const error = await rejectionOf(store.getPushState('blog'));

    expect(error).to.be.instanceOf(StateStoreError);
    expect(error).to.have.property('code', 'STATE_STORE_ERROR');
  });

  it('rejects records with missing fields', async () => {
    await fs.mkdir(path.dirname(store.getPath()), { recursive: true });
    await fs.writeFile(store.getPath(), JSON.stringify({
      version: 1,
      sites: { blog: { lastPush: { revisionId: 'abc' } } }
    }));

    const error = await rejectionOf(store.getSiteState('blog'));

    expect(error).to.be.instanceOf(StateStoreError);
    expect(error).to.have.property('message', 'Sync state file is malformed: sites.blog.lastPush.timestamp must be a string');
  });

  describe('record factories', () => {
    it('derives push status from the outcome', () => {
      const partial = SyncStateStore.createPushRecord('r9',
        outcomeWith({ itemsAttempted: 3, itemsTransferred: 2, itemsFailed: 1 }), ['c.php'], 'Fix header');

      expect(partial).to.deep.equal({
        revisionId: 'r9',
        revisionSummary: 'Fix header',
        timestamp: '2024-05-01T12:30:00.000Z',
        status: 'partial',
        itemsTransferred: 2,
        itemsFailed: 1,
        bytesTransferred: 0,
        pendingPaths: ['c.php'],
        pendingDeletes: []
      });

      expect(SyncStateStore.createPushRecord('r9', outcomeWith({ itemsFailed: 2 }), []).status).to.equal('failed');
      expect(SyncStateStore.createPushRecord('r9', outcomeWith({ cancelled: true }), []).status).to.equal('cancelled');
    });

    it('stores pull windows as ISO strings', () => {
      const record = SyncStateStore.createPullRecord(new Date(0), new Date(1000), outcomeWith({}));

      expect(record.windowStart).to.equal('1970-01-01T00:00:00.000Z');
      expect(record.windowEnd).to.equal('1970-01-01T00:00:01.000Z');
      expect(record.status).to.equal('success');
    });
  });
});
