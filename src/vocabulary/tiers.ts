import type { Category, Priority } from '../types/index.js';

export const TIER_ORDER = ['CRITICAL', 'STRATEGIC', 'OPERATIONAL', 'OPPORTUNITY'] as const;

export type TierId = (typeof TIER_ORDER)[number];

export type TierDocumentKey = 'CRITICAL' | 'STRATEGIC' | 'OPERATIONAL' | 'OPPORTUNITIES';

export interface TierDefinition {
  id: TierId;
  documentKey: TierDocumentKey;
  priority: Exclude<Priority, 5>;
  category: Exclude<Category, 'neutral'>;
  defaultDescription: string;
}

export const TIERS: Readonly<Record<TierId, TierDefinition>> = {
  CRITICAL: {
    id: 'CRITICAL',
    documentKey: 'CRITICAL',
    priority: 1,
    category: 'critical',
    defaultDescription: 'Crisis and trust-damaging language that needs an immediate response.',
  },
  STRATEGIC: {
    id: 'STRATEGIC',
    documentKey: 'STRATEGIC',
    priority: 2,
    category: 'strategic',
    defaultDescription: 'Brand loyalty erosion and unfavourable comparisons with competitors.',
  },
  OPERATIONAL: {
    id: 'OPERATIONAL',
    documentKey: 'OPERATIONAL',
    priority: 3,
    category: 'operational',
    defaultDescription: 'Usability and process friction.',
  },
  OPPORTUNITY: {
    id: 'OPPORTUNITY',
    documentKey: 'OPPORTUNITIES',
    priority: 4,
    category: 'opportunity',
    defaultDescription: 'Purchase intent and feature requests.',
  },
};

/**
 * Resolves a user-supplied tier name. Matching is case-insensitive and accepts both the
 * tier id and its persisted document key, so `opportunity` and `OPPORTUNITIES` name the
 * same tier.
 */
export function resolveTier(name: string): TierId | undefined {
  const normalized = name.trim().toUpperCase();
  return TIER_ORDER.find((id) => id === normalized || TIERS[id].documentKey === normalized);
}

/** The persisted key for a user-supplied tier name, or the upper-cased name when it names no tier. */
export function documentKeyOf(name: string): string {
  const tier = resolveTier(name);
  return tier ? TIERS[tier].documentKey : name.trim().toUpperCase();
}
