/**
 * Cardwise Engine - Spending Categories
 * Canonical user-facing categories and the issuer labels treated as
 * equivalent when matching a card's reward map.
 *
 * @module category-synonyms
 */

/** Canonical category → issuer labels, in match-priority order */
export type CategorySynonymTable = Readonly<Record<string, readonly string[]>>

export const DEFAULT_CATEGORY_SYNONYMS: CategorySynonymTable = Object.freeze({
  groceries:          Object.freeze(['groceries', 'grocery_stores', 'supermarkets']),
  gas:                Object.freeze(['gas', 'gas_stations', 'fuel']),
  restaurants:        Object.freeze(['dining', 'restaurants', 'food']),
  travel:             Object.freeze(['travel', 'airlines', 'hotels', 'car_rental']),
  online_shopping:    Object.freeze(['online', 'e_commerce', 'amazon']),
  department_stores:  Object.freeze(['department_stores', 'retail']),
  utilities:          Object.freeze(['utilities', 'bills']),
  streaming_services: Object.freeze(['streaming', 'entertainment']),
  phone_bill:         Object.freeze(['phone', 'telecommunications']),
})

// Offered to users by the API. The optimizer itself accepts any category string.
export const SPENDING_CATEGORIES = [
  'groceries', 'gas', 'restaurants', 'travel', 'online_shopping',
  'department_stores', 'utilities', 'insurance', 'entertainment',
  'streaming_services', 'phone_bill', 'other',
] as const

export type SpendingCategory = typeof SPENDING_CATEGORIES[number]

/**
 * Issuer labels for a canonical category. Categories without an entry match
 * only themselves.
 */
export function aliasesFor(
  category: string,
  table: CategorySynonymTable = DEFAULT_CATEGORY_SYNONYMS,
): readonly string[] {
  return Object.prototype.hasOwnProperty.call(table, category) ? table[category] : [category]
}
