import { readFile } from 'node:fs/promises';
import type { RelationshipRegistry } from '../policy/relationship-cache.js';
import {
  isBaselineType,
  isRelationshipType,
  type ContextSnapshot,
  type Relationship,
} from '../policy/sharing-policy.js';
import type { ContextProvider } from '../session/context-publisher.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.filter((v: unknown): v is string => typeof v === 'string') : undefined;
}

async function readJsonObject(path: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
  if (!isRecord(parsed)) {
    throw new Error(`${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Parse one relationship record from JSON. Unrecognized records are null.
 */
export function parseRelationship(value: unknown): Relationship | null {
  if (!isRecord(value) || !isRelationshipType(value.type)) {
    return null;
  }
  const relationship: Relationship = { type: value.type };
  if (isBaselineType(value.baseType)) {
    relationship.baseType = value.baseType;
  }
  const hidden = stringList(value.hiddenTopics);
  if (hidden) {
    relationship.hiddenTopics = hidden;
  }
  const revealed = stringList(value.revealedTopics);
  if (revealed) {
    relationship.revealedTopics = revealed;
  }
  return relationship;
}

/**
 * Relationships read from a JSON file keyed by local user, then remote user:
 *
 * ```json
 * { "alice": { "bob": { "type": "friend" } } }
 * ```
 *
 * The file is re-read on every lookup so edits take effect once the
 * relationship cache expires.
 */
export class JsonRelationshipRegistry implements RelationshipRegistry {
  constructor(private readonly path: string) {}

  async getRelationship(localUser: string, remoteUser: string): Promise<Relationship | null> {
    const data = await readJsonObject(this.path);
    const forLocal = data[localUser];
    if (!isRecord(forLocal)) {
      return null;
    }
    return parseRelationship(forLocal[remoteUser]);
  }
}

/**
 * Context snapshots read from a JSON file keyed by local user. The file is
 * read on every pull, so each update reflects its current contents.
 */
export class JsonContextProvider implements ContextProvider {
  constructor(private readonly path: string) {}

  async getSnapshot(localUser: string): Promise<ContextSnapshot> {
    const data = await readJsonObject(this.path);
    const snapshot = data[localUser];
    return isRecord(snapshot) ? snapshot : {};
  }
}
