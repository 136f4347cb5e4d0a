/**
 * Cardwise Engine - Category Rate Resolver
 *
 * Works out what one card earns on one spending category. Resolution stops
 * at the first rule that applies:
 *   1. direct    — the category itself is a key of the card's reward map
 *   2. synonym   — the first issuer label (table order) that is a key
 *   3. rotating  — the card has a rotating_5x rate and this quarter's
 *                  schedule text mentions the category or one of its labels
 *   4. base      — rewards.base_rate
 *
 * Cashback rates are percentages; points rates are points per dollar and
 * the reward is a point count.
 *
 * @module rate-resolver
 */

import { ROTATING_BONUS_KEY, type Card } from './card-model'
import { aliasesFor, DEFAULT_CATEGORY_SYNONYMS, type CategorySynonymTable } from './category-synonyms'
import { currentQuarter, systemClock, type Clock } from './quarter'

// ─── Environment ──────────────────────────────────────────────────────────

export interface RewardEnvironment {
  synonyms: CategorySynonymTable
  clock: Clock
}

export const DEFAULT_REWARD_ENVIRONMENT: RewardEnvironment = Object.freeze({
  synonyms: DEFAULT_CATEGORY_SYNONYMS,
  clock: systemClock,
})

// ─── Resolution ───────────────────────────────────────────────────────────

export type RateMatch = 'direct' | 'synonym' | 'rotating' | 'base'

export interface ResolvedRate {
  rate: number
  match: RateMatch
  label: string | null // reward-map key that supplied the rate
}

function hasKey(map: Record<string, number>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key)
}

export function resolveCategoryRate(
  card: Card,
  category: string,
  env: RewardEnvironment = DEFAULT_REWARD_ENVIRONMENT,
): ResolvedRate {
  const { categories, rotating_schedule } = card.rewards

  if (hasKey(categories, category)) {
    return { rate: categories[category], match: 'direct', label: category }
  }

  const aliases = aliasesFor(category, env.synonyms)
  const alias = aliases.find(a => hasKey(categories, a))
  if (alias !== undefined) {
    return { rate: categories[alias], match: 'synonym', label: alias }
  }

  if (hasKey(categories, ROTATING_BONUS_KEY)) {
    const description = rotating_schedule?.[currentQuarter(env.clock)]
    if (description !== undefined) {
      const text = description.toLowerCase()
      if (aliases.some(a => text.includes(a.toLowerCase()))) {
        return { rate: categories[ROTATING_BONUS_KEY], match: 'rotating', label: ROTATING_BONUS_KEY }
      }
    }
  }

  return { rate: card.rewards.base_rate, match: 'base', label: null }
}

// ─── Conversion ───────────────────────────────────────────────────────────

export function rewardFromRate(card: Card, amount: number, rate: number): number {
  return card.type === 'cashback' ? amount * (rate / 100) : amount * rate
}

export function calculateCategoryReward(
  card: Card,
  category: string,
  amount: number,
  env: RewardEnvironment = DEFAULT_REWARD_ENVIRONMENT,
): number {
  return rewardFromRate(card, amount, resolveCategoryRate(card, category, env).rate)
}

export function calculateBaseReward(card: Card, amount: number): number {
  return rewardFromRate(card, amount, card.rewards.base_rate)
}

/** Reward per dollar spent; 0 when nothing is spent */
export function effectiveRate(reward: number, amount: number): number {
  return amount > 0 ? reward / amount : 0
}
