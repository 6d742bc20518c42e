/**
 * Comment Manager
 *
 * Keeps at most one live comment per identity on a pull request:
 * find the comments carrying the identity's marker, then create, update,
 * delete or skip.
 *
 * Listing and writing are separate calls, so two runs for the same
 * identity can still race and both create a comment. The next run
 * finds both and removes all but the newest.
 */

import type { Logger } from '../logging/index.js';
import type { CommentApi, PullRequestComment } from './client.js';
import { commentMarker, withMarker, type CommentIdentity } from './marker.js';

export type CommentAction = 'created' | 'updated' | 'deleted' | 'skipped';

export interface PublishPolicy {
  /** Remove (or never post) the comment when the result carries no signal */
  silentSkipOnZero?: boolean;
  /** The body reports a zero-impact result */
  isZero?: boolean;
}

/**
 * Newest first: by creation time, then by id
 */
function byNewest(a: PullRequestComment, b: PullRequestComment): number {
  const ta = Date.parse(a.createdAt);
  const tb = Date.parse(b.createdAt);
  const va = Number.isNaN(ta) ? 0 : ta;
  const vb = Number.isNaN(tb) ? 0 : tb;
  return vb - va || b.id - a.id;
}

export class CommentManager {
  private api: CommentApi;
  private logger?: Logger;

  constructor(api: CommentApi, logger?: Logger) {
    this.api = api;
    this.logger = logger;
  }

  /**
   * Existing comments for an identity, newest first
   */
  async find(identity: CommentIdentity): Promise<PullRequestComment[]> {
    const marker = commentMarker(identity);
    const comments = await this.api.listComments();
    return comments.filter(c => c.body.includes(marker)).sort(byNewest);
  }

  async publish(identity: CommentIdentity, body: string, policy: PublishPolicy = {}): Promise<CommentAction> {
    const marker = commentMarker(identity);
    const [existing, ...duplicates] = await this.find(identity);

    for (const duplicate of duplicates) {
      this.logger?.warn(`Removing duplicate ${identity.kind} comment ${duplicate.id} for ${identity.folder}`);
      await this.api.deleteComment(duplicate.id);
    }

    if (policy.silentSkipOnZero && policy.isZero) {
      if (!existing) {
        this.logger?.info(`No ${identity.kind} comment for ${identity.folder} (nothing to report)`);
        return 'skipped';
      }
      await this.api.deleteComment(existing.id);
      this.logger?.info(`Deleted ${identity.kind} comment ${existing.id} for ${identity.folder}`);
      return 'deleted';
    }

    const fullBody = withMarker(body, marker);

    if (existing) {
      await this.api.updateComment(existing.id, fullBody);
      this.logger?.info(`Updated ${identity.kind} comment ${existing.id} for ${identity.folder}`);
      return 'updated';
    }

    const created = await this.api.createComment(fullBody);
    this.logger?.info(`Created ${identity.kind} comment ${created.id} for ${identity.folder}`);
    return 'created';
  }
}

export function createCommentManager(api: CommentApi, logger?: Logger): CommentManager {
  return new CommentManager(api, logger);
}
