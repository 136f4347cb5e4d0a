/**
 * Cardwise Engine — Card & User Store
 *
 * Key-value persistence for the card catalog, each user's held cards and
 * their saved preferences. Netlify Blobs backs it in production; tests use
 * the in-memory store.
 *
 * Keys:
 *   catalog:cards          all known cards
 *   user-cards:<userId>    cards a user holds
 *   preferences:<userId>   reward preference + saved monthly spending
 *
 * Unreadable values load as empty rather than failing the request.
 *
 * @module card-store
 */

import { getStore } from '@netlify/blobs'
import { z } from 'zod'
import { loadDefaultCards } from './card-catalog'
import { normalizeCard, type Card, type Preference } from './card-model'
import {
  parseCardList,
  preferenceSchema,
  spendingPlanSchema,
  type CardRecord,
  type PreferencesPatch,
} from './validation'

// ─── Backend Abstraction ──────────────────────────────────────────────────

export interface KeyValueStore {
  getJSON(key: string): Promise<unknown>
  setJSON(key: string, value: unknown): Promise<void>
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data = new Map<string, string>()

  async getJSON(key: string): Promise<unknown> {
    const raw = this.data.get(key)
    return raw === undefined ? null : JSON.parse(raw)
  }

  async setJSON(key: string, value: unknown): Promise<void> {
    this.data.set(key, JSON.stringify(value))
  }

  keys(): string[] {
    return [...this.data.keys()]
  }
}

export class BlobsKeyValueStore implements KeyValueStore {
  private store: ReturnType<typeof getStore> | null = null

  constructor(private readonly storeName: string) {}

  // Resolved on first use; getStore needs the Netlify request context.
  private blobs(): ReturnType<typeof getStore> {
    if (!this.store) this.store = getStore({ name: this.storeName, consistency: 'strong' })
    return this.store
  }

  async getJSON(key: string): Promise<unknown> {
    try {
      const value: unknown = await this.blobs().get(key, { type: 'json' })
      return value ?? null
    } catch (e) {
      if (!(e instanceof SyntaxError)) throw e
      console.warn(`[Store] Unreadable JSON under ${key}: ${e.message}`)
      return null
    }
  }

  async setJSON(key: string, value: unknown): Promise<void> {
    await this.blobs().setJSON(key, value)
  }
}

// ─── Preferences ──────────────────────────────────────────────────────────

export const userPreferencesSchema = z.object({
  reward_preference: preferenceSchema,
  monthly_spending: spendingPlanSchema,
  created_at: z.string(),
  updated_at: z.string().optional(),
})

export type UserPreferences = z.infer<typeof userPreferencesSchema>

// ─── Repository ───────────────────────────────────────────────────────────

const CATALOG_KEY = 'catalog:cards'
const userCardsKey = (userId: string) => `user-cards:${userId}`
const preferencesKey = (userId: string) => `preferences:${userId}`

export interface CardRepositoryOptions {
  seedDefaultCatalog: boolean
  defaultPreference: Preference
  now?: () => Date
}

export class CardRepository {
  private readonly now: () => Date

  constructor(
    private readonly store: KeyValueStore,
    private readonly options: CardRepositoryOptions,
  ) {
    this.now = options.now ?? (() => new Date())
  }

  private timestamp(): string {
    return this.now().toISOString()
  }

  private async readCards(key: string): Promise<Card[] | null> {
    const raw = await this.store.getJSON(key)
    if (raw === null || raw === undefined) return null
    const { records, dropped } = parseCardList(raw)
    if (dropped > 0) console.warn(`[Store] Dropped ${dropped} unreadable card record(s) under ${key}`)
    return records.map(normalizeCard)
  }

  private defaultPreferences(): UserPreferences {
    return {
      reward_preference: this.options.defaultPreference,
      monthly_spending: {},
      created_at: this.timestamp(),
    }
  }

  /** Seed anything missing for the given user and the shared catalog. */
  async initialize(userId: string): Promise<void> {
    if ((await this.store.getJSON(CATALOG_KEY)) === null) {
      await this.store.setJSON(CATALOG_KEY, this.options.seedDefaultCatalog ? this.seedCards() : [])
    }
    if ((await this.store.getJSON(userCardsKey(userId))) === null) {
      await this.store.setJSON(userCardsKey(userId), [])
    }
    if ((await this.store.getJSON(preferencesKey(userId))) === null) {
      await this.store.setJSON(preferencesKey(userId), this.defaultPreferences())
    }
  }

  private seedCards(): Card[] {
    const stamp = this.timestamp()
    return loadDefaultCards().map(card => ({ ...card, updated_at: stamp }))
  }

  // ─── Catalog ─────────────────────────────────────────────────────────

  async getAllCards(): Promise<Card[]> {
    const cards = await this.readCards(CATALOG_KEY)
    if (cards !== null) return cards
    if (!this.options.seedDefaultCatalog) return []

    const seeded = this.seedCards()
    await this.store.setJSON(CATALOG_KEY, seeded)
    return seeded
  }

  async getCard(cardId: string): Promise<Card | null> {
    const cards = await this.getAllCards()
    return cards.find(card => card.id === cardId) ?? null
  }

  async updateCard(cardId: string, patch: Partial<Omit<CardRecord, 'id'>>): Promise<boolean> {
    const cards = await this.getAllCards()
    const index = cards.findIndex(card => card.id === cardId)
    if (index === -1) return false

    cards[index] = normalizeCard({ ...cards[index], ...patch, id: cardId, updated_at: this.timestamp() })
    await this.store.setJSON(CATALOG_KEY, cards)
    return true
  }

  /** Merge records into the catalog by id. Returns how many were written. */
  async upsertCards(records: readonly CardRecord[]): Promise<number> {
    if (records.length === 0) return 0

    const cards = await this.getAllCards()
    const stamp = this.timestamp()
    const positions = new Map(cards.map((card, i) => [card.id, i]))

    for (const record of records) {
      const existing = positions.get(record.id)
      if (existing === undefined) {
        positions.set(record.id, cards.length)
        cards.push(normalizeCard({ ...record, updated_at: stamp }))
      } else {
        cards[existing] = normalizeCard({ ...cards[existing], ...record, updated_at: stamp })
      }
    }

    await this.store.setJSON(CATALOG_KEY, cards)
    return records.length
  }

  // ─── User Cards ──────────────────────────────────────────────────────

  async getUserCards(userId: string): Promise<Card[]> {
    return (await this.readCards(userCardsKey(userId))) ?? []
  }

  /** Adding a card the user already holds replaces it in place. */
  async addUserCard(userId: string, record: CardRecord): Promise<Card> {
    const cards = await this.getUserCards(userId)
    const card = normalizeCard({ ...record, added_at: this.timestamp() })

    const index = cards.findIndex(c => c.id === card.id)
    if (index === -1) cards.push(card)
    else cards[index] = card

    await this.store.setJSON(userCardsKey(userId), cards)
    return card
  }

  async removeUserCard(userId: string, cardId: string): Promise<boolean> {
    const cards = await this.getUserCards(userId)
    const remaining = cards.filter(card => card.id !== cardId)
    if (remaining.length === cards.length) return false

    await this.store.setJSON(userCardsKey(userId), remaining)
    return true
  }

  // ─── Preferences ─────────────────────────────────────────────────────

  async getUserPreferences(userId: string): Promise<UserPreferences> {
    const raw = await this.store.getJSON(preferencesKey(userId))
    const parsed = userPreferencesSchema.safeParse(raw)
    return parsed.success ? parsed.data : this.defaultPreferences()
  }

  async updateUserPreferences(userId: string, patch: PreferencesPatch): Promise<UserPreferences> {
    const current = await this.getUserPreferences(userId)
    const next: UserPreferences = {
      ...current,
      reward_preference: patch.reward_preference ?? current.reward_preference,
      monthly_spending: patch.monthly_spending ?? current.monthly_spending,
      updated_at: this.timestamp(),
    }
    await this.store.setJSON(preferencesKey(userId), next)
    return next
  }
}
