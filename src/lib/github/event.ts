/**
 * Pull request resolution
 *
 * Reads the PR number from the workflow event payload; for events that
 * carry none, asks GitHub which PR the commit belongs to.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { describeError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import type { GitHubClient } from './client.js';

export const PULL_REQUEST_EVENTS = ['pull_request', 'pull_request_target'] as const;

const EventPayloadSchema = z.object({
  number: z.number().optional(),
  pull_request: z.object({ number: z.number() }).optional(),
  issue: z
    .object({
      number: z.number(),
      pull_request: z.unknown().optional(),
    })
    .optional(),
});

export function isPullRequestEvent(eventName: string): boolean {
  return (PULL_REQUEST_EVENTS as readonly string[]).includes(eventName);
}

export function prNumberFromPayload(payload: unknown): number | null {
  const parsed = EventPayloadSchema.safeParse(payload);
  if (!parsed.success) return null;
  const { number, pull_request, issue } = parsed.data;
  if (pull_request) return number ?? pull_request.number;
  if (issue && issue.pull_request !== undefined) return issue.number;
  return null;
}

export interface ResolvePullRequestOptions {
  eventPath?: string;
  sha?: string;
  client?: GitHubClient;
  logger?: Logger;
}

export async function resolvePullRequestNumber(options: ResolvePullRequestOptions): Promise<number | null> {
  const { eventPath, sha, client, logger } = options;

  if (eventPath) {
    try {
      const payload: unknown = JSON.parse(await readFile(eventPath, 'utf-8'));
      const number = prNumberFromPayload(payload);
      if (number !== null) return number;
    } catch (error) {
      logger?.warn(`Failed reading event payload for PR number: ${describeError(error)}`);
    }
  }

  if (sha && client) {
    try {
      return await client.findPullRequestForCommit(sha);
    } catch (error) {
      logger?.warn(`Failed resolving PR via commit association: ${describeError(error)}`);
    }
  }

  return null;
}
