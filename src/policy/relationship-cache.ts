import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { shortId, withTimeout } from '../utils.js';
import {
  STRANGER,
  isBaselineType,
  isRelationshipType,
  type Relationship,
} from './sharing-policy.js';

/**
 * Source of relationship records, owned by the storage layer.
 * Resolves null when no relationship is recorded.
 */
export interface RelationshipRegistry {
  getRelationship(localUser: string, remoteUser: string): Promise<Relationship | null>;
}

export interface RelationshipCacheOptions {
  /** How long a fetched relationship is considered fresh (ms) */
  ttlMs: number;
  /** Upper bound on a registry lookup (ms) */
  lookupTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

interface CacheEntry {
  relationship: Relationship;
  fetchedAt: number;
}

/**
 * Read-through cache over the relationship registry.
 *
 * Fresh entries are served directly. When the registry fails or times out,
 * an expired entry is served rather than freezing communication; with no
 * entry at all the answer is stranger. Nothing is ever written back.
 */
export class RelationshipCache {
  private entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly lookupTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger | null;

  constructor(
    private readonly registry: RelationshipRegistry,
    options: RelationshipCacheOptions,
  ) {
    this.ttlMs = options.ttlMs;
    this.lookupTimeoutMs = options.lookupTimeoutMs ?? 2000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? null;
  }

  async get(localUser: string, remoteUser: string): Promise<Relationship> {
    const key = cacheKey(localUser, remoteUser);
    const cached = this.entries.get(key);
    if (cached && this.now() - cached.fetchedAt < this.ttlMs) {
      return cached.relationship;
    }

    try {
      const fetched = await withTimeout(
        this.registry.getRelationship(localUser, remoteUser),
        this.lookupTimeoutMs,
        'Relationship lookup',
        'REGISTRY_TIMEOUT',
      );
      const relationship = normalizeRelationship(fetched);
      this.entries.set(key, { relationship, fetchedAt: this.now() });
      return relationship;
    } catch (err) {
      if (cached) {
        this.logger?.debug(`Relationship lookup for ${shortId(remoteUser)} failed, serving stale entry: ${describeError(err)}`);
        return cached.relationship;
      }
      this.logger?.warn(`Relationship lookup for ${shortId(remoteUser)} failed, treating as stranger: ${describeError(err)}`);
      return STRANGER;
    }
  }

  /**
   * Forget everything cached about a remote user (e.g. when their session ends).
   */
  invalidate(remoteUser: string): void {
    for (const key of this.entries.keys()) {
      if (key.endsWith(`\u0000${remoteUser}`)) {
        this.entries.delete(key);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

function cacheKey(localUser: string, remoteUser: string): string {
  return `${localUser}\u0000${remoteUser}`;
}

/**
 * Coerce whatever the registry returned into a well-formed relationship.
 * Missing or unrecognized records collapse to stranger.
 */
export function normalizeRelationship(record: Relationship | null | undefined): Relationship {
  if (!record || !isRelationshipType(record.type)) {
    return STRANGER;
  }

  const relationship: Relationship = { type: record.type };
  if (record.type === 'custom' && isBaselineType(record.baseType)) {
    relationship.baseType = record.baseType;
  }
  const hidden: unknown = record.hiddenTopics;
  if (Array.isArray(hidden)) {
    relationship.hiddenTopics = hidden.filter((t: unknown): t is string => typeof t === 'string');
  }
  const revealed: unknown = record.revealedTopics;
  if (Array.isArray(revealed)) {
    relationship.revealedTopics = revealed.filter((t: unknown): t is string => typeof t === 'string');
  }
  return relationship;
}
