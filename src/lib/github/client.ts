/**
 * GitHub REST client
 *
 * Issue-comment endpoints for one pull request. PR comments are issue
 * comments in the REST API.
 */

import { z } from 'zod';
import { CommentApiError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PullRequestComment {
  id: number;
  body: string;
  createdAt: string;
}

/** Comment operations the comment manager needs */
export interface CommentApi {
  listComments(): Promise<PullRequestComment[]>;
  createComment(body: string): Promise<PullRequestComment>;
  updateComment(commentId: number, body: string): Promise<void>;
  deleteComment(commentId: number): Promise<void>;
}

export interface GitHubClientConfig {
  token: string;
  owner: string;
  repo: string;
  /** Defaults to https://api.github.com (GITHUB_API_URL on GHES) */
  apiUrl?: string;
  requestTimeoutMs?: number;
}

export interface GitHubCommentsConfig extends GitHubClientConfig {
  prNumber: number;
}

const PAGE_SIZE = 100;

const CommentSchema = z.object({
  id: z.number(),
  body: z.string().nullable().optional(),
  created_at: z.string().optional(),
});

const PullSchema = z.object({ number: z.number() });

// ============================================================================
// Base client
// ============================================================================

export class GitHubClient {
  protected config: Required<GitHubClientConfig>;

  constructor(config: GitHubClientConfig) {
    this.config = {
      token: config.token,
      owner: config.owner,
      repo: config.repo,
      apiUrl: config.apiUrl ?? 'https://api.github.com',
      requestTimeoutMs: config.requestTimeoutMs ?? 30000,
    };
  }

  protected repoUrl(path: string): string {
    return `${this.config.apiUrl.replace(/\/$/, '')}/repos/${this.config.owner}/${this.config.repo}${path}`;
  }

  /**
   * @throws {CommentApiError} on transport failure or a status not in `accept`
   */
  protected async request(
    method: string,
    path: string,
    body?: unknown,
    accept: number[] = []
  ): Promise<{ status: number; data: unknown }> {
    let response: Response;
    try {
      response = await fetch(this.repoUrl(path), {
        method,
        headers: {
          Accept: 'application/vnd.github+json',
          Authorization: `Bearer ${this.config.token}`,
          'X-GitHub-Api-Version': '2022-11-28',
          'User-Agent': 'iac-pilot',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new CommentApiError(
        `${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        0
      );
    }

    if (!response.ok && !accept.includes(response.status)) {
      throw new CommentApiError(`GitHub API error: ${response.status} on ${method} ${path}`, response.status);
    }

    if (method === 'DELETE' || response.status === 204 || !response.ok) {
      return { status: response.status, data: null };
    }
    return { status: response.status, data: await response.json() };
  }

  /**
   * PR associated with a commit, for events without a PR payload
   */
  async findPullRequestForCommit(sha: string): Promise<number | null> {
    const { data } = await this.request('GET', `/commits/${sha}/pulls`);
    const parsed = z.array(PullSchema).safeParse(data);
    if (!parsed.success || parsed.data.length === 0) return null;
    return parsed.data[0].number;
  }
}

// ============================================================================
// PR comments
// ============================================================================

export class GitHubCommentsClient extends GitHubClient implements CommentApi {
  private prNumber: number;

  constructor(config: GitHubCommentsConfig) {
    super(config);
    this.prNumber = config.prNumber;
  }

  async listComments(): Promise<PullRequestComment[]> {
    const comments: PullRequestComment[] = [];

    for (let page = 1; ; page++) {
      const { data } = await this.request(
        'GET',
        `/issues/${this.prNumber}/comments?per_page=${PAGE_SIZE}&page=${page}`
      );
      const parsed = z.array(CommentSchema).safeParse(data);
      if (!parsed.success) {
        throw new CommentApiError(`Unexpected comment list payload on page ${page}`, 200);
      }

      comments.push(...parsed.data.map(toComment));
      if (parsed.data.length < PAGE_SIZE) break;
    }

    return comments;
  }

  async createComment(body: string): Promise<PullRequestComment> {
    const { data } = await this.request('POST', `/issues/${this.prNumber}/comments`, { body });
    const parsed = CommentSchema.safeParse(data);
    if (!parsed.success) {
      throw new CommentApiError('Unexpected payload creating comment', 201);
    }
    return toComment(parsed.data);
  }

  async updateComment(commentId: number, body: string): Promise<void> {
    await this.request('PATCH', `/issues/comments/${commentId}`, { body });
  }

  /** Already-deleted comments (404) are fine */
  async deleteComment(commentId: number): Promise<void> {
    await this.request('DELETE', `/issues/comments/${commentId}`, undefined, [404]);
  }
}

function toComment(raw: z.infer<typeof CommentSchema>): PullRequestComment {
  return { id: raw.id, body: raw.body ?? '', createdAt: raw.created_at ?? '' };
}

// ============================================================================
// Factory
// ============================================================================

export function createGitHubCommentsClient(config: GitHubCommentsConfig): GitHubCommentsClient {
  return new GitHubCommentsClient(config);
}
