import type { VersionControlClient } from '../git/client.js';
import { VersionControlFailure } from '../types/errors.js';
import type { ChangeSet, GitIdentity } from '../types/sync.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('change-capture');

export interface CaptureRequest {
  /** Path allow-list; empty captures everything */
  pathspecs: readonly string[];
  message: string;
  author: GitIdentity;
  committer: GitIdentity;
  signoff?: boolean;
  sign?: boolean;
}

/**
 * Detects and commits the scoped working-tree diff.
 */
export class ChangeCapture {
  constructor(private readonly git: VersionControlClient) {}

  async capture(request: CaptureRequest): Promise<ChangeSet> {
    const pathspecs = Object.freeze([...request.pathspecs]);
    const files = await this.git.listChanges(pathspecs);

    log.info({ pathspecs, fileCount: files.length }, files.length ? 'Captured changes' : 'No changes in scope');

    return Object.freeze({
      pathspecs,
      message: request.message,
      author: request.author,
      committer: request.committer,
      signoff: request.signoff ?? false,
      sign: request.sign ?? false,
      files: Object.freeze(files),
      empty: files.length === 0,
    });
  }

  /**
   * Commit the change set on the currently checked-out branch. Paths outside
   * the scope are left untouched.
   */
  async commit(changeSet: ChangeSet): Promise<string> {
    if (changeSet.empty) {
      throw new VersionControlFailure('commit', 'change set is empty', { step: 'capture' });
    }
    return this.git.stageAndCommit({
      pathspecs: changeSet.pathspecs,
      message: changeSet.message,
      author: changeSet.author,
      committer: changeSet.committer,
      signoff: changeSet.signoff,
      sign: changeSet.sign,
    });
  }
}
