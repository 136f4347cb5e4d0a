/**
 * Cardwise Engine - Recommendation Engine
 * Advisory entries attached to an optimization run. Each check runs
 * independently and the output order is fixed: missing categories, annual
 * fee, rotating reminder, sign-up bonus.
 *
 * The opportunity checks look at every card passed in, not only the cards
 * that matched the reward preference.
 *
 * @module recommendations
 */

import type { Card } from './card-model'
import { currentQuarter } from './quarter'
import {
  calculateCategoryReward,
  DEFAULT_REWARD_ENVIRONMENT,
  effectiveRate,
  type RewardEnvironment,
} from './rate-resolver'
import type { CategoryBreakdown } from './reward-optimizer'

// ─── Types ────────────────────────────────────────────────────────────────

export type RecommendationType = 'missing_categories' | 'annual_fee' | 'rotating' | 'signup_bonus'

export type RecommendationPriority = 'high' | 'medium' | 'low'

export interface Recommendation {
  type: RecommendationType
  title: string
  description: string
  priority: RecommendationPriority
}

// A category is under-optimized when some card beats its rate by more than 50%
export const MISSING_CATEGORY_UPLIFT = 1.5

export const ANNUAL_FEE_MIN_NET_BENEFIT = 100

// ─── Missing High-Reward Categories ───────────────────────────────────────

export function findMissingHighRewardCategories(
  breakdown: CategoryBreakdown,
  allCards: readonly Card[],
  env: RewardEnvironment = DEFAULT_REWARD_ENVIRONMENT,
): string[] {
  const missing: string[] = []

  for (const [category, data] of Object.entries(breakdown)) {
    const better = allCards.some(card => {
      const potential = calculateCategoryReward(card, category, data.amount, env)
      return effectiveRate(potential, data.amount) > data.reward_rate * MISSING_CATEGORY_UPLIFT
    })
    if (better) missing.push(category)
  }

  return missing
}

// ─── Annual Fee Breakeven ─────────────────────────────────────────────────

export function analyzeAnnualFees(
  breakdown: CategoryBreakdown,
  allCards: readonly Card[],
  env: RewardEnvironment = DEFAULT_REWARD_ENVIRONMENT,
): Recommendation | null {
  const entries = Object.entries(breakdown)
  const currentAnnual = entries.reduce((sum, [, data]) => sum + data.reward_amount * 12, 0)

  for (const card of allCards) {
    if (card.annual_fee <= 0) continue

    const monthlyPotential = entries.reduce(
      (sum, [category, data]) => sum + calculateCategoryReward(card, category, data.amount, env),
      0,
    )
    const netBenefit = monthlyPotential * 12 - currentAnnual - card.annual_fee

    if (netBenefit > ANNUAL_FEE_MIN_NET_BENEFIT) {
      return {
        type: 'annual_fee',
        title: `Consider ${card.name}`,
        description: `Could earn $${netBenefit.toFixed(0)} more annually after $${card.annual_fee} fee`,
        priority: 'medium',
      }
    }
  }

  return null
}

// ─── Static Reminders ─────────────────────────────────────────────────────

export function rotatingCategoryReminder(env: RewardEnvironment = DEFAULT_REWARD_ENVIRONMENT): Recommendation {
  return {
    type: 'rotating',
    title: `Check ${currentQuarter(env.clock)} rotating categories`,
    description: "Make sure you're maximizing quarterly bonus categories",
    priority: 'low',
  }
}

/** Generic reminder; not tied to any particular card. */
export function signUpBonusNudge(): Recommendation {
  return {
    type: 'signup_bonus',
    title: 'New card opportunities',
    description: 'Consider new cards with sign-up bonuses if you can meet spending requirements',
    priority: 'low',
  }
}

// ─── Pipeline ─────────────────────────────────────────────────────────────

export function generateRecommendations(
  breakdown: CategoryBreakdown,
  allCards: readonly Card[],
  env: RewardEnvironment = DEFAULT_REWARD_ENVIRONMENT,
): Recommendation[] {
  const recommendations: Recommendation[] = []

  const missing = findMissingHighRewardCategories(breakdown, allCards, env)
  if (missing.length > 0) {
    recommendations.push({
      type: 'missing_categories',
      title: 'Consider cards for high-spend categories',
      description: `You could earn more rewards in: ${missing.join(', ')}`,
      priority: 'high',
    })
  }

  const feeRecommendation = analyzeAnnualFees(breakdown, allCards, env)
  if (feeRecommendation) recommendations.push(feeRecommendation)

  recommendations.push(rotatingCategoryReminder(env))
  recommendations.push(signUpBonusNudge())

  return recommendations
}
