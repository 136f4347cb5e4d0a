/**
 * Recommendation Engine — Test Suite
 * Validates: missing-category threshold, annual-fee breakeven, fixed reminders
 */
import { describe, it, expect } from 'vitest'
import { loadDefaultCards } from './card-catalog'
import { normalizeCard, type Card } from './card-model'
import { fixedClock } from './quarter'
import { DEFAULT_REWARD_ENVIRONMENT, type RewardEnvironment } from './rate-resolver'
import {
  analyzeAnnualFees,
  findMissingHighRewardCategories,
  generateRecommendations,
  rotatingCategoryReminder,
  signUpBonusNudge,
} from './recommendations'
import type { CategoryBreakdown } from './reward-optimizer'

const [freedom, sapphire, , amexGold] = loadDefaultCards()

const Q3: RewardEnvironment = { ...DEFAULT_REWARD_ENVIRONMENT, clock: fixedClock('2026-08-15T12:00:00.000Z') }
const Q4: RewardEnvironment = { ...DEFAULT_REWARD_ENVIRONMENT, clock: fixedClock('2026-11-15T12:00:00.000Z') }

function cashbackCard(id: string, baseRate: number, annualFee = 0): Card {
  return normalizeCard({ id, name: id, issuer: 'Test Bank', type: 'cashback', rewards: { base_rate: baseRate }, annual_fee: annualFee })
}

const onePercent = cashbackCard('one-percent', 1)

// $500 of groceries on Freedom at 1.5% → $7.50/month, $90/year
const groceriesOnFreedom: CategoryBreakdown = {
  groceries: { amount: 500, best_card: freedom, reward_amount: 7.5, reward_rate: 0.015 },
}

// ── Missing High-Reward Categories ─────────────────────────────────────────

describe('findMissingHighRewardCategories', () => {
  const otherOnOnePercent: CategoryBreakdown = {
    other: { amount: 100, best_card: onePercent, reward_amount: 1, reward_rate: 0.01 },
  }

  it('should flag a category when a card beats it by more than half', () => {
    expect(findMissingHighRewardCategories(otherOnOnePercent, [onePercent, cashbackCard('two', 2)], Q3)).toEqual(['other'])
  })

  it('should not flag a smaller improvement', () => {
    expect(findMissingHighRewardCategories(otherOnOnePercent, [onePercent, cashbackCard('one-four', 1.4)], Q3)).toEqual([])
  })

  it('should flag a category with no selected card once any card earns', () => {
    const empty: CategoryBreakdown = {
      gas: { amount: 100, best_card: null, reward_amount: 0, reward_rate: 0 },
    }
    expect(findMissingHighRewardCategories(empty, [onePercent], Q3)).toEqual(['gas'])
  })

  it('should keep breakdown order when flagging several', () => {
    const breakdown: CategoryBreakdown = {
      travel: { amount: 200, best_card: onePercent, reward_amount: 2, reward_rate: 0.01 },
      groceries: { amount: 500, best_card: onePercent, reward_amount: 5, reward_rate: 0.01 },
      other: { amount: 50, best_card: onePercent, reward_amount: 0.5, reward_rate: 0.01 },
    }
    // Sapphire earns 2 points on travel, Amex Gold 4 on groceries; "other" is 1 point on both
    expect(findMissingHighRewardCategories(breakdown, [onePercent, sapphire, amexGold], Q3)).toEqual(['travel', 'groceries', 'other'])
    expect(findMissingHighRewardCategories(breakdown, [onePercent, cashbackCard('two', 2)], Q3)).toEqual(['travel', 'groceries', 'other'])
    expect(findMissingHighRewardCategories(breakdown, [onePercent], Q3)).toEqual([])
  })
})

// ── Annual Fee Breakeven ───────────────────────────────────────────────────

describe('analyzeAnnualFees', () => {
  it('should recommend the first fee card whose net benefit clears $100', () => {
    // Sapphire: 500 pts × 12 = 6000 − 90 − 95 = 5815
    expect(analyzeAnnualFees(groceriesOnFreedom, [freedom, sapphire, amexGold], Q3)).toEqual({
      type: 'annual_fee',
      title: 'Consider Chase Sapphire Preferred',
      description: 'Could earn $5815 more annually after $95 fee',
      priority: 'medium',
    })
  })

  it('should skip fee cards that do not pay for themselves', () => {
    // $10/month × 12 = 120 − 90 − 95 = −65
    const marginal = cashbackCard('marginal', 2, 95)
    expect(analyzeAnnualFees(groceriesOnFreedom, [marginal], Q3)).toBeNull()
  })

  it('should move on to a later card when an earlier fee card falls short', () => {
    // $25/month × 12 = 300 − 90 − 50 = 160
    const marginal = cashbackCard('marginal', 2, 95)
    const strong = cashbackCard('strong', 5, 50)
    expect(analyzeAnnualFees(groceriesOnFreedom, [marginal, strong], Q3)?.description)
      .toBe('Could earn $160 more annually after $50 fee')
  })

  it('should ignore cards without an annual fee', () => {
    expect(analyzeAnnualFees(groceriesOnFreedom, [cashbackCard('rich-no-fee', 10)], Q3)).toBeNull()
  })

  it('should require strictly more than $100', () => {
    // $20/month × 12 = 240 − 90 − 50 = 100
    const exact = cashbackCard('exact', 4, 50)
    expect(analyzeAnnualFees(groceriesOnFreedom, [exact], Q3)).toBeNull()
  })

  it('should have nothing to compare against an empty breakdown', () => {
    expect(analyzeAnnualFees({}, [amexGold], Q3)).toBeNull()
  })
})

// ── Reminders & Pipeline ───────────────────────────────────────────────────

describe('static reminders', () => {
  it('should name the current quarter', () => {
    expect(rotatingCategoryReminder(Q4).title).toBe('Check Q4 rotating categories')
    expect(rotatingCategoryReminder(Q4).priority).toBe('low')
  })

  it('should offer a fixed sign-up nudge', () => {
    expect(signUpBonusNudge()).toEqual({
      type: 'signup_bonus',
      title: 'New card opportunities',
      description: 'Consider new cards with sign-up bonuses if you can meet spending requirements',
      priority: 'low',
    })
  })
})

describe('generateRecommendations', () => {
  it('should always end with one rotating and one sign-up entry', () => {
    const scenarios: [CategoryBreakdown, Card[]][] = [
      [{}, []],
      [groceriesOnFreedom, [freedom]],
      [groceriesOnFreedom, [freedom, sapphire, amexGold]],
    ]
    for (const [breakdown, cards] of scenarios) {
      const types = generateRecommendations(breakdown, cards, Q3).map(r => r.type)
      expect(types.filter(t => t === 'rotating')).toHaveLength(1)
      expect(types.filter(t => t === 'signup_bonus')).toHaveLength(1)
      expect(types.slice(-2)).toEqual(['rotating', 'signup_bonus'])
    }
  })

  it('should add only the reminders when nothing is triggered', () => {
    expect(generateRecommendations(groceriesOnFreedom, [freedom], Q3).map(r => r.type)).toEqual(['rotating', 'signup_bonus'])
  })

  it('should order triggered entries before the reminders', () => {
    const types = generateRecommendations(groceriesOnFreedom, [freedom, sapphire, amexGold], Q3).map(r => r.type)
    expect(types).toEqual(['missing_categories', 'annual_fee', 'rotating', 'signup_bonus'])
  })
})
