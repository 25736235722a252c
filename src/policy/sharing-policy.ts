/**
 * Sensitivity categories a context snapshot may carry.
 * Anything not listed here is unknown and never shared.
 */
export const CONTEXT_CATEGORIES = [
  'general_mood',
  'basic_status',
  'activities',
  'interests',
  'general_life_updates',
  'work_status',
  'health',
  'location',
  'family_issues',
  'financial_info',
  'intimate_details',
  'private_thoughts',
] as const;

export type ContextCategory = typeof CONTEXT_CATEGORIES[number];

/**
 * Point-in-time shareable state of a user, keyed by category name.
 * Keys are plain strings: a provider may hand over categories this
 * module does not know.
 */
export type ContextSnapshot = Readonly<Record<string, unknown>>;

export type BaselineRelationshipType = 'stranger' | 'friend' | 'family';

export type RelationshipType = BaselineRelationshipType | 'custom' | 'blocked';

export const RELATIONSHIP_TYPES: readonly RelationshipType[] = ['stranger', 'friend', 'family', 'custom', 'blocked'];

/**
 * Directed relationship from the local user to a remote user.
 */
export interface Relationship {
  type: RelationshipType;
  /** For `custom`: the coarser type whose baseline the custom rules narrow. Absent means stranger. */
  baseType?: BaselineRelationshipType;
  /** For `custom`: categories the user hid from this person. */
  hiddenTopics?: readonly string[];
  /** For `family`: categories the user explicitly un-hid. Only `private_thoughts` is honored. */
  revealedTopics?: readonly string[];
}

export interface SharingPolicy {
  allowed: ReadonlySet<ContextCategory>;
  denied: ReadonlySet<ContextCategory>;
}

export const STRANGER: Relationship = Object.freeze({ type: 'stranger' });

const FAMILY_HIDDEN_BY_DEFAULT: readonly ContextCategory[] = ['private_thoughts'];

const BASELINE_ALLOWED: Record<BaselineRelationshipType, readonly ContextCategory[]> = {
  stranger: ['general_mood', 'basic_status'],
  friend: ['general_mood', 'basic_status', 'activities', 'interests', 'general_life_updates', 'work_status'],
  family: CONTEXT_CATEGORIES.filter(c => !FAMILY_HIDDEN_BY_DEFAULT.includes(c)),
};

export function isContextCategory(value: string): value is ContextCategory {
  return (CONTEXT_CATEGORIES as readonly string[]).includes(value);
}

export function isRelationshipType(value: unknown): value is RelationshipType {
  return typeof value === 'string' && (RELATIONSHIP_TYPES as readonly string[]).includes(value);
}

export function isBaselineType(value: unknown): value is BaselineRelationshipType {
  return value === 'stranger' || value === 'friend' || value === 'family';
}

/**
 * Normalize a user-supplied topic tag for comparison with category names.
 */
export function normalizeTopic(tag: string): string {
  return tag.trim().toLowerCase();
}

function complement(allowed: ReadonlySet<ContextCategory>): Set<ContextCategory> {
  return new Set(CONTEXT_CATEGORIES.filter(c => !allowed.has(c)));
}

/**
 * The fixed baseline table for a non-custom relationship type.
 */
export function baselinePolicy(type: BaselineRelationshipType): SharingPolicy {
  const allowed = new Set(BASELINE_ALLOWED[type]);
  return { allowed, denied: complement(allowed) };
}

/**
 * The baseline type a relationship is measured against.
 * Custom relationships without a base, and blocked ones, fall back to stranger.
 */
export function baselineTypeOf(relationship: Relationship): BaselineRelationshipType {
  if (isBaselineType(relationship.type)) {
    return relationship.type;
  }
  if (relationship.type === 'custom' && isBaselineType(relationship.baseType)) {
    return relationship.baseType;
  }
  return 'stranger';
}

/**
 * Derive the sharing policy for a relationship.
 *
 * Only two adjustments exist on top of the baseline table: a family
 * relationship may re-reveal private_thoughts, and a custom relationship
 * may hide categories from its base. Custom tags can never add a category.
 */
export function resolveSharingPolicy(relationship: Relationship): SharingPolicy {
  if (relationship.type === 'blocked') {
    return { allowed: new Set(), denied: new Set(CONTEXT_CATEGORIES) };
  }

  if (!isRelationshipType(relationship.type)) {
    return baselinePolicy('stranger');
  }

  const base = baselinePolicy(baselineTypeOf(relationship));
  const allowed = new Set(base.allowed);

  if (relationship.type === 'family' && relationship.revealedTopics) {
    const revealed = new Set(relationship.revealedTopics.map(normalizeTopic));
    for (const category of FAMILY_HIDDEN_BY_DEFAULT) {
      if (revealed.has(category)) {
        allowed.add(category);
      }
    }
  }

  if (relationship.type === 'custom' && relationship.hiddenTopics) {
    for (const tag of relationship.hiddenTopics) {
      const topic = normalizeTopic(tag);
      if (isContextCategory(topic)) {
        allowed.delete(topic);
      }
    }
  }

  return { allowed, denied: complement(allowed) };
}
