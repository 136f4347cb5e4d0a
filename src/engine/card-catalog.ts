/**
 * Cardwise Engine — Card Catalog
 *
 * Bundled default cards plus the ingestion side of the catalog: a provider
 * yields raw card records and refreshCatalog validates them and merges the
 * good ones into the repository.
 *
 * StaticCatalogProvider serves a fixed per-issuer feed; there is no live
 * issuer integration.
 *
 * @module card-catalog
 */

import defaultCards from '../data/default-cards.json'
import issuerFeed from '../data/issuer-feed.json'
import { normalizeCard, type Card } from './card-model'
import type { CardRepository } from './card-store'
import { cardRecordSchema, validateIngestedCard, type CardRecord, type ValidationIssue } from './validation'

// ─── Defaults ─────────────────────────────────────────────────────────────

export function loadDefaultCards(): Card[] {
  return cardRecordSchema.array().parse(defaultCards).map(normalizeCard)
}

// ─── Providers ────────────────────────────────────────────────────────────

export interface CardCatalogProvider {
  readonly name: string
  fetchCards(): Promise<unknown[]>
}

export type IssuerFeed = Record<string, readonly unknown[]>

export class StaticCatalogProvider implements CardCatalogProvider {
  readonly name = 'static-issuer-feed'

  constructor(
    private readonly feed: IssuerFeed = issuerFeed,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async fetchCards(): Promise<unknown[]> {
    const scrapedAt = this.now().toISOString()
    const records: unknown[] = []

    for (const [issuer, cards] of Object.entries(this.feed)) {
      console.log(`[Catalog] Loading ${issuer} cards (${cards.length})`)
      for (const card of cards) {
        records.push(card !== null && typeof card === 'object' ? { ...card, scraped_at: scrapedAt } : card)
      }
    }

    return records
  }
}

// ─── Refresh ──────────────────────────────────────────────────────────────

export interface RefreshSummary {
  updated: number
  skipped: number
  issues: { index: number; errors: ValidationIssue[] }[]
}

export async function refreshCatalog(
  provider: CardCatalogProvider,
  repository: CardRepository,
): Promise<RefreshSummary> {
  console.log(`[Catalog] Starting catalog refresh from ${provider.name}`)

  const raw = await provider.fetchCards()
  const accepted: CardRecord[] = []
  const issues: RefreshSummary['issues'] = []

  raw.forEach((record, index) => {
    const result = validateIngestedCard(record)
    if (result.valid) {
      accepted.push(result.data)
    } else {
      console.warn(`[Catalog] Skipping record #${index}: ${result.errors.map(e => `${e.path || '(root)'} ${e.message}`).join('; ')}`)
      issues.push({ index, errors: result.errors })
    }
  })

  const updated = await repository.upsertCards(accepted)
  console.log(`[Catalog] Updated ${updated} cards, skipped ${issues.length}`)

  return { updated, skipped: issues.length, issues }
}
