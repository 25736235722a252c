import { PolicyError } from '../errors.js';
import {
  isContextCategory,
  resolveSharingPolicy,
  type ContextSnapshot,
  type Relationship,
  type RelationshipType,
} from './sharing-policy.js';

/** Set by FilteredContext's static block; the only caller of its constructor. */
let issue: (entries: ContextSnapshot, relationshipType: RelationshipType) => FilteredContext;

/**
 * A snapshot that has passed the context filter.
 *
 * The constructor is private and only `filterContext` can reach it;
 * sessions accept nothing else for a context update.
 */
export class FilteredContext {
  static {
    issue = (entries, relationshipType) => new FilteredContext(entries, relationshipType);
  }

  private constructor(
    private readonly entries: ContextSnapshot,
    readonly relationshipType: RelationshipType,
  ) {}

  get values(): ContextSnapshot {
    return this.entries;
  }

  categories(): string[] {
    return Object.keys(this.entries);
  }

  isEmpty(): boolean {
    return this.categories().length === 0;
  }

  toJSON(): ContextSnapshot {
    return this.entries;
  }
}

/**
 * Restrict a snapshot to what the relationship permits.
 * Pure and total: unknown categories are dropped, never passed through.
 */
export function filterContext(snapshot: ContextSnapshot, relationship: Relationship): FilteredContext {
  const policy = resolveSharingPolicy(relationship);
  const entries: Record<string, unknown> = {};

  for (const [category, value] of Object.entries(snapshot)) {
    // Unknown categories are never in `allowed`, so they fall through here.
    if (isContextCategory(category) && policy.allowed.has(category) && value !== undefined) {
      entries[category] = value;
    }
  }

  return issue(Object.freeze(entries), relationship.type);
}

/**
 * Categories in `context` that the relationship does not allow.
 */
export function findPolicyViolations(context: ContextSnapshot, relationship: Relationship): string[] {
  const policy = resolveSharingPolicy(relationship);
  return Object.keys(context).filter(
    category => !isContextCategory(category) || !policy.allowed.has(category),
  );
}

/**
 * Re-check a filtered context right before it is sent.
 * @throws PolicyError (POLICY_VIOLATION) naming the offending categories
 */
export function assertPolicyCompliance(context: FilteredContext, relationship: Relationship): void {
  const violations = findPolicyViolations(context.values, relationship);
  if (violations.length > 0) {
    throw new PolicyError(
      `Context carries categories not allowed for ${relationship.type}: ${violations.join(', ')}`,
      'POLICY_VIOLATION',
    );
  }
}
