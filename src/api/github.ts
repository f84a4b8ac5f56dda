/**
 * GitHub webhook support: signature verification and normalization of
 * push / pull_request payloads into trigger events.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { TriggerEvent, TriggerKind } from '../domain/pipeline';
import { isRecord } from './middleware';

export const SIGNATURE_HEADER = 'x-hub-signature-256';
export const EVENT_HEADER = 'x-github-event';

const PULL_REQUEST_ACTIONS = new Set(['opened', 'synchronize', 'reopened']);

export function signPayload(secret: string, payload: Buffer | string): string {
  return `sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`;
}

/** Constant-time check of an `x-hub-signature-256` header value. */
export function verifySignature(secret: string, payload: Buffer, signature: string | undefined): boolean {
  if (!signature) return false;
  const expected = Buffer.from(signPayload(secret, payload));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length) return false;
  return timingSafeEqual(expected, actual);
}

function pick(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function pickString(value: unknown, ...path: string[]): string | undefined {
  const found = pick(value, ...path);
  return typeof found === 'string' && found !== '' ? found : undefined;
}

/**
 * Trigger for a webhook delivery, or null when the delivery starts nothing
 * (other event types, closed pull requests, branch deletions).
 */
export function normalizeGitHubEvent(event: string, payload: unknown): TriggerEvent | null {
  const repository = pickString(payload, 'repository', 'full_name');
  if (!repository) return null;

  if (event === 'push') {
    const ref = pickString(payload, 'ref');
    const commit = pickString(payload, 'after');
    if (!ref || !commit || pick(payload, 'deleted') === true) return null;
    if (ref.startsWith('refs/tags/')) return { kind: TriggerKind.PushTag, ref, repository, commit };
    if (ref.startsWith('refs/heads/')) return { kind: TriggerKind.PushBranch, ref, repository, commit };
    return null;
  }

  if (event === 'pull_request') {
    const action = pickString(payload, 'action');
    const number = pick(payload, 'number');
    const commit = pickString(payload, 'pull_request', 'head', 'sha');
    const base = pickString(payload, 'pull_request', 'base', 'ref');
    if (!action || !PULL_REQUEST_ACTIONS.has(action) || typeof number !== 'number' || !commit || !base) return null;
    return {
      kind: TriggerKind.PullRequest,
      ref: `refs/pull/${number}/merge`,
      repository,
      commit,
      baseRef: base.startsWith('refs/') ? base : `refs/heads/${base}`,
    };
  }

  return null;
}
