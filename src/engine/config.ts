/**
 * Cardwise Engine — Runtime Settings
 * Environment overrides merged over DEFAULT_CONFIG.
 *
 * @module config
 */

import type { Preference } from './card-model'
import { parsePreference } from './reward-optimizer'

export interface CardwiseConfig {
  storeName: string
  defaultUserId: string
  seedDefaultCatalog: boolean
  defaultPreference: Preference
}

export const DEFAULT_CONFIG: CardwiseConfig = {
  storeName: 'cardwise-data',
  defaultUserId: 'default',
  seedDefaultCatalog: true,
  defaultPreference: 'cashback',
}

type Env = Record<string, string | undefined>

function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase())
}

function readString(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim()
  return trimmed ? trimmed : fallback
}

export function loadConfig(env: Env = process.env): CardwiseConfig {
  return {
    storeName: readString(env.CARD_STORE_NAME, DEFAULT_CONFIG.storeName),
    defaultUserId: readString(env.DEFAULT_USER_ID, DEFAULT_CONFIG.defaultUserId),
    seedDefaultCatalog: readFlag(env.SEED_DEFAULT_CATALOG, DEFAULT_CONFIG.seedDefaultCatalog),
    defaultPreference: env.DEFAULT_PREFERENCE
      ? parsePreference(env.DEFAULT_PREFERENCE.trim())
      : DEFAULT_CONFIG.defaultPreference,
  }
}
