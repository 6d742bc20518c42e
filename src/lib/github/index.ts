/**
 * GitHub Integration Module
 *
 * Provides:
 * - PR comment REST client (paginated listing, create/update/delete)
 * - Comment lifecycle: at most one live comment per identity
 * - Identity markers embedded in comment bodies
 * - PR number resolution from the workflow event
 */

export {
  GitHubClient,
  GitHubCommentsClient,
  createGitHubCommentsClient,
  type CommentApi,
  type GitHubClientConfig,
  type GitHubCommentsConfig,
  type PullRequestComment,
} from './client.js';

export {
  CommentManager,
  createCommentManager,
  type CommentAction,
  type PublishPolicy,
} from './manager.js';

export {
  commentMarker,
  isHtmlCommentMarker,
  withMarker,
  type CommentIdentity,
  type CommentKind,
} from './marker.js';

export {
  isPullRequestEvent,
  prNumberFromPayload,
  resolvePullRequestNumber,
  PULL_REQUEST_EVENTS,
  type ResolvePullRequestOptions,
} from './event.js';
