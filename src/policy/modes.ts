import { filterContext } from './context-filter.js';
import type { ContextCategory, Relationship } from './sharing-policy.js';

/**
 * Personality modes a companion runs in. Chosen by the conversational layer;
 * the mesh only relays them.
 */
export type CompanionMode = 'default' | 'kalki' | 'jupiter' | 'educational' | 'healthcare';

export const COMPANION_MODES: readonly CompanionMode[] = ['default', 'kalki', 'jupiter', 'educational', 'healthcare'];

/**
 * What a mode reveals about the user. Crisis and emotional-support modes say
 * more than the mode name suggests, so they ride on the most private category.
 */
export const MODE_CATEGORIES: Record<CompanionMode, ContextCategory> = {
  default: 'basic_status',
  educational: 'activities',
  healthcare: 'health',
  jupiter: 'private_thoughts',
  kalki: 'private_thoughts',
};

export function isCompanionMode(value: unknown): value is CompanionMode {
  return typeof value === 'string' && (COMPANION_MODES as readonly string[]).includes(value);
}

/**
 * The mode to disclose to a peer, or null when the relationship does not
 * permit the category the mode reveals.
 */
export function shareableMode(mode: CompanionMode, relationship: Relationship): CompanionMode | null {
  const category = MODE_CATEGORIES[mode];
  const filtered = filterContext({ [category]: mode }, relationship);
  return filtered.values[category] === mode ? mode : null;
}
