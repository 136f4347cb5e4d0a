/**
 * Cardwise Engine - Reward Optimizer
 * Picks the best held card for every spending category and projects the
 * monthly and annual reward, then attaches advisory recommendations.
 *
 * @module reward-optimizer
 */

import type { Card, Preference } from './card-model'
import { fixedClock } from './quarter'
import {
  calculateBaseReward,
  calculateCategoryReward,
  DEFAULT_REWARD_ENVIRONMENT,
  effectiveRate,
  type RewardEnvironment,
} from './rate-resolver'
import { generateRecommendations, type Recommendation } from './recommendations'

// ─── Types ────────────────────────────────────────────────────────────────

export type SpendingPlan = Record<string, number>

export interface CategoryOptimization {
  amount: number
  best_card: Card | null
  reward_amount: number
  reward_rate: number
}

export type CategoryBreakdown = Record<string, CategoryOptimization>

export interface OptimizationResult {
  total_monthly_rewards: number
  total_annual_rewards: number
  currency: 'USD' | 'points'
  category_breakdown: CategoryBreakdown
  recommendations: Recommendation[]
  optimization_date: string
}

export interface NoCardsResult {
  error: string
  recommendations: []
}

export type OptimizationOutcome = OptimizationResult | NoCardsResult

export const NO_CARDS_MESSAGE = 'No credit cards found. Please add your cards first.'

export function isNoCardsResult(outcome: OptimizationOutcome): outcome is NoCardsResult {
  return 'error' in outcome
}

// ─── Helpers ──────────────────────────────────────────────────────────────

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100
}

/** Absent → cashback; anything other than cashback/points → any */
export function parsePreference(raw: string | null | undefined): Preference {
  if (raw === undefined || raw === null) return 'cashback'
  return raw === 'cashback' || raw === 'points' ? raw : 'any'
}

// ─── Eligible-Card Filter ─────────────────────────────────────────────────

export function filterEligibleCards(cards: readonly Card[], preference: Preference): Card[] {
  if (preference === 'any') return [...cards]
  return cards.filter(card => card.type === preference)
}

// ─── Best-Card Selector ───────────────────────────────────────────────────

export interface BestCardSelection {
  card: Card | null
  reward: number
}

/**
 * Strictly greatest reward wins, so on a tie the card listed first keeps
 * the slot. With no eligible cards the selection is empty; if no card earns
 * anything the first eligible card is reported at its base rate.
 */
export function findBestCardForCategory(
  cards: readonly Card[],
  category: string,
  amount: number,
  env: RewardEnvironment = DEFAULT_REWARD_ENVIRONMENT,
): BestCardSelection {
  let best: Card | null = null
  let maxReward = 0

  for (const card of cards) {
    const reward = calculateCategoryReward(card, category, amount, env)
    if (reward > maxReward) {
      maxReward = reward
      best = card
    }
  }

  if (best === null && cards.length > 0) {
    best = cards[0]
    maxReward = calculateBaseReward(best, amount)
  }

  return { card: best, reward: maxReward }
}

// ─── Orchestration ────────────────────────────────────────────────────────

export function optimizeSpending(
  userCards: readonly Card[],
  spendingCategories: SpendingPlan,
  preference: Preference = 'cashback',
  env: RewardEnvironment = DEFAULT_REWARD_ENVIRONMENT,
): OptimizationOutcome {
  if (userCards.length === 0) {
    return { error: NO_CARDS_MESSAGE, recommendations: [] }
  }

  // One clock reading per run: quarter matching and the timestamp agree.
  const now = env.clock.now()
  const runEnv: RewardEnvironment = { ...env, clock: fixedClock(now) }

  const eligible = filterEligibleCards(userCards, preference)
  const breakdown: CategoryBreakdown = {}
  let totalRewards = 0

  for (const [category, amount] of Object.entries(spendingCategories)) {
    if (!(amount > 0)) continue

    const { card, reward } = findBestCardForCategory(eligible, category, amount, runEnv)
    // defineProperty keeps keys such as "__proto__" as own entries
    Object.defineProperty(breakdown, category, {
      value: { amount, best_card: card, reward_amount: reward, reward_rate: effectiveRate(reward, amount) },
      enumerable: true,
      writable: true,
      configurable: true,
    })
    totalRewards += reward
  }

  const recommendations = generateRecommendations(breakdown, userCards, runEnv)

  return {
    total_monthly_rewards: roundCurrency(totalRewards),
    total_annual_rewards: roundCurrency(totalRewards * 12),
    currency: preference === 'cashback' ? 'USD' : 'points',
    category_breakdown: breakdown,
    recommendations,
    optimization_date: now.toISOString(),
  }
}
