/**
 * Cardwise Engine - Card Model
 *
 * Shapes used by the optimizer and the catalog. Field names follow the
 * stored catalog format (snake_case), which is also the wire format.
 *
 * Absent optional fields are filled here, once, by normalizeCard:
 *   • rewards.base_rate → 1
 *   • rewards.categories → {}
 *   • annual_fee → 0
 *
 * @module card-model
 */

import type { Quarter } from './quarter'
import type { CardRecord } from './validation'

export type CardType = 'cashback' | 'points'

export type Preference = CardType | 'any'

export interface CardRewards {
  base_rate: number
  categories: Record<string, number>
  rotating_schedule?: Partial<Record<Quarter, string>>
}

export interface SignUpBonus {
  amount: number | string
  requirement: string
}

export interface Card {
  id: string
  name: string
  issuer: string
  type: CardType
  rewards: CardRewards
  annual_fee: number
  sign_up_bonus?: SignUpBonus
  annual_credits?: Record<string, number>
  updated_at?: string
  added_at?: string
  scraped_at?: string
  source_url?: string
}

export const CARD_DEFAULTS = {
  base_rate: 1,
  annual_fee: 0,
} as const

export const ROTATING_BONUS_KEY = 'rotating_5x'

export function normalizeCard(record: CardRecord): Card {
  const rewards: NonNullable<CardRecord['rewards']> = record.rewards ?? {}
  const normalized: CardRewards = {
    base_rate: rewards.base_rate ?? CARD_DEFAULTS.base_rate,
    categories: { ...(rewards.categories ?? {}) },
  }
  if (rewards.rotating_schedule) normalized.rotating_schedule = { ...rewards.rotating_schedule }

  return {
    ...record,
    rewards: normalized,
    annual_fee: record.annual_fee ?? CARD_DEFAULTS.annual_fee,
  }
}

