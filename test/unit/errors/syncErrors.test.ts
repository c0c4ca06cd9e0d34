import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  ConfigurationError,
  ConnectionError,
  CredentialNotFoundError,
  LockTimeoutError,
  PlanningError,
  RevisionSourceError,
  SiteSyncError,
  StateStoreError,
  errorCodeOf
} from '../../../src/errors/syncErrors.js';
import { abortedResult, summarizeResult, toSyncFailure, CompletedSync } from '../../../src/sync/SyncResult.js';
import { OperationOutcome, PlannedItem } from '../../../src/sync/types.js';

function completed(items: PlannedItem[], outcome: Partial<OperationOutcome>): CompletedSync {
  return {
    status: 'completed',
    direction: 'push',
    siteId: 'blog',
    plan: { direction: 'push', items, advisories: [] },
    outcome: {
      succeeded: true,
      cancelled: false,
      itemsAttempted: items.length,
      itemsTransferred: items.length,
      itemsFailed: 0,
      bytesTransferred: 0,
      failures: [],
      notes: [],
      unattemptedPaths: [],
      startedAt: '2024-05-01T12:00:00.000Z',
      finishedAt: '2024-05-01T12:00:01.000Z',
      ...outcome
    }
  };
}

const twoItems: PlannedItem[] = [
  { relativePath: 'index.html', action: 'upload' },
  { relativePath: 'old.html', action: 'delete' }
];

describe('Site sync errors', () => {
  describe('SiteSyncError', () => {
    it('carries a code, data and the subclass name', () => {
      const error = new ConfigurationError('siteId is required', 'siteId');

      expect(error).to.be.instanceOf(SiteSyncError);
      expect(error.name).to.equal('ConfigurationError');
      expect(error.code).to.equal('CONFIGURATION_ERROR');
      expect(error.data).to.deep.equal({ field: 'siteId' });
    });

    it('keeps the cause message of a connection failure', () => {
      const error = new ConnectionError('Unable to connect', 'sftp.example.test', 22, new Error('ECONNREFUSED'));

      expect(error.data).to.deep.equal({ host: 'sftp.example.test', port: 22, reason: 'ECONNREFUSED' });
    });

    it('describes the lock holder', () => {
      const error = new LockTimeoutError('blog', 500, 'pull', { pid: 7, hostname: 'web1', operation: 'push' });

      expect(error.message).to.equal('Site "blog" is busy (push by PID 7 on web1); waited 500ms for pull');
      expect(error.code).to.equal('SITE_BUSY');
    });

    it('names the missing key material', () => {
      const error = new CredentialNotFoundError('blog', 'transportKeyMaterial');
      expect(error.message).to.equal('No key material found for site "blog"');
    });
  });

  describe('errorCodeOf', () => {
    it('reads string and numeric codes only', () => {
      expect(errorCodeOf(Object.assign(new Error('x'), { code: 'ENOENT' }))).to.equal('ENOENT');
      expect(errorCodeOf({ code: 2 })).to.equal(2);
      expect(errorCodeOf({ code: { nested: true } })).to.be.undefined;
      expect(errorCodeOf('ENOENT')).to.be.undefined;
    });
  });

  describe('toSyncFailure', () => {
    it('maps each error class to an abort kind', () => {
      expect(toSyncFailure(new ConfigurationError('bad')).kind).to.equal('configuration');
      expect(toSyncFailure(new CredentialNotFoundError('blog', 'transportPassword')).kind).to.equal('configuration');
      expect(toSyncFailure(new ConnectionError('down', 'h', 22)).kind).to.equal('connection');
      expect(toSyncFailure(new LockTimeoutError('blog', 0, 'push')).kind).to.equal('busy');
      expect(toSyncFailure(new PlanningError('listing failed')).kind).to.equal('planning');
      expect(toSyncFailure(new StateStoreError('unreadable', '/state/blog.json')).kind).to.equal('planning');
    });

    it('treats a missing repository or revision as configuration', () => {
      const unknown = new RevisionSourceError('gone', 'UNKNOWN_REVISION', '/srv/blog');
      const broken = new RevisionSourceError('crashed', 'GIT_FAILED', '/srv/blog');

      expect(toSyncFailure(unknown)).to.deep.equal({
        kind: 'configuration',
        code: 'UNKNOWN_REVISION',
        message: 'gone',
        details: { repoPath: '/srv/blog' }
      });
      expect(toSyncFailure(broken).kind).to.equal('planning');
    });

    it('wraps unexpected errors as planning failures', () => {
      expect(toSyncFailure(new TypeError('boom'))).to.deep.equal({
        kind: 'planning',
        code: 'PLANNING_ERROR',
        message: 'Unexpected failure before transfer: boom'
      });
    });

    it('builds a frozen aborted result', () => {
      const result = abortedResult('pull', 'blog', new ConnectionError('down', 'h', 22));

      expect(result.status).to.equal('aborted');
      expect(result.error.kind).to.equal('connection');
      expect(Object.isFrozen(result)).to.be.true;
      expect(summarizeResult(result)).to.equal('aborted');
    });
  });

  describe('summarizeResult', () => {
    it('distinguishes empty, clean, partial, failed and cancelled runs', () => {
      expect(summarizeResult(completed([], { itemsAttempted: 0, itemsTransferred: 0 }))).to.equal('nothing_to_do');
      expect(summarizeResult(completed(twoItems, {}))).to.equal('success');
      expect(summarizeResult(completed(twoItems, { succeeded: false, itemsTransferred: 1, itemsFailed: 1 })))
        .to.equal('partial');
      expect(summarizeResult(completed(twoItems, { succeeded: false, itemsTransferred: 0, itemsFailed: 2 })))
        .to.equal('failed');
      expect(summarizeResult(completed(twoItems, {
        succeeded: false,
        cancelled: true,
        itemsAttempted: 1,
        itemsTransferred: 1,
        unattemptedPaths: ['old.html']
      }))).to.equal('cancelled');
    });
  });
});
