import { PolicyError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { assertPolicyCompliance, filterContext, findPolicyViolations } from '../policy/context-filter.js';
import { shareableMode, type CompanionMode } from '../policy/modes.js';
import type { RelationshipCache } from '../policy/relationship-cache.js';
import type { ContextSnapshot, Relationship } from '../policy/sharing-policy.js';
import { shortId, withTimeout } from '../utils.js';
import type { SendResult, Session } from './session.js';

/**
 * Source of the local user's shareable state, keyed by category.
 */
export interface ContextProvider {
  getSnapshot(localUser: string): Promise<ContextSnapshot>;
}

export interface ContextPublisherConfig {
  /** The local user the companion acts for */
  ownerId: string;
  provider: ContextProvider;
  relationships: RelationshipCache;
  /** Upper bound on a snapshot pull (ms) */
  contextTimeoutMs: number;
  logger?: Logger;
}

export type PublishResult =
  | { peerId: string; status: SendResult; categories: string[] }
  | { peerId: string; status: 'skipped'; reason: string }
  | { peerId: string; status: 'withheld'; reason: string; categories?: string[] };

/**
 * Builds outbound context and mode messages for a session: pull a fresh
 * snapshot, look up the relationship, filter, re-check, send.
 */
export class ContextPublisher {
  constructor(private readonly config: ContextPublisherConfig) {}

  /**
   * Push one context update to a session. A slow or failing provider skips
   * the cycle for this peer only.
   */
  async publish(session: Session): Promise<PublishResult> {
    const { peerId } = session;
    const { provider, ownerId, contextTimeoutMs, logger } = this.config;

    let snapshot: ContextSnapshot;
    try {
      snapshot = await withTimeout(
        provider.getSnapshot(ownerId),
        contextTimeoutMs,
        'Context snapshot',
        'CONTEXT_TIMEOUT',
      );
    } catch (err) {
      logger?.warn(`Skipping context update for ${shortId(peerId)}: ${describeError(err)}`);
      return { peerId, status: 'skipped', reason: describeError(err) };
    }

    const relationship = await this.relationshipFor(session);
    if (relationship.type === 'blocked') {
      return { peerId, status: 'withheld', reason: 'blocked' };
    }

    const filtered = filterContext(snapshot, relationship);
    try {
      assertPolicyCompliance(filtered, relationship);
    } catch (err) {
      if (err instanceof PolicyError) {
        logger?.error(`Withheld context for ${shortId(peerId)}: ${err.message}`);
        return {
          peerId,
          status: 'withheld',
          reason: 'policy-violation',
          categories: findPolicyViolations(filtered.values, relationship),
        };
      }
      throw err;
    }

    if (filtered.isEmpty()) {
      return { peerId, status: 'skipped', reason: 'nothing shareable' };
    }

    const status = session.sendContext(filtered);
    logger?.debug(`Context update for ${shortId(peerId)} ${status}: ${filtered.categories().join(', ')}`);
    return { peerId, status, categories: filtered.categories() };
  }

  /**
   * Tell a session's peer which mode the companion is in, if the
   * relationship permits what the mode reveals.
   */
  async publishMode(session: Session, mode: CompanionMode): Promise<PublishResult> {
    const relationship = await this.relationshipFor(session);
    const shared = shareableMode(mode, relationship);
    if (shared === null) {
      return { peerId: session.peerId, status: 'withheld', reason: `mode not shareable with ${relationship.type}` };
    }
    return { peerId: session.peerId, status: session.sendMode(shared), categories: [] };
  }

  private relationshipFor(session: Session): Promise<Relationship> {
    return this.config.relationships.get(this.config.ownerId, session.remote.ownerId);
  }
}
