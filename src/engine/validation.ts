/**
 * Cardwise Engine - Data Validation Schemas
 * Runtime validation for catalog records, ingested cards and HTTP request
 * bodies. Uses Zod for type-safe validation.
 *
 * @module validation
 */

import { z } from 'zod'

// ─── Primitive Validators ─────────────────────────────────────────────────

const rate = z.number().min(0)
const dollarAmount = z.number().min(0).max(1_000_000_000)
const cardId = z.string().min(1).max(100)
const label = z.string().min(1).max(200)

// ─── Card Records ─────────────────────────────────────────────────────────

export const cardTypeSchema = z.enum(['cashback', 'points'])

export const preferenceSchema = z.enum(['cashback', 'points', 'any'])

export const rotatingScheduleSchema = z.object({
  Q1: z.string(),
  Q2: z.string(),
  Q3: z.string(),
  Q4: z.string(),
}).partial()

export const rewardsRecordSchema = z.object({
  base_rate: rate.optional(),
  categories: z.record(rate).optional(),
  rotating_schedule: rotatingScheduleSchema.optional(),
})

export const signUpBonusSchema = z.object({
  amount: z.union([z.number().min(0), z.string()]),
  requirement: z.string(),
})

export const cardRecordSchema = z.object({
  id: cardId,
  name: label,
  issuer: label,
  type: cardTypeSchema,
  rewards: rewardsRecordSchema.optional(),
  annual_fee: dollarAmount.optional(),
  sign_up_bonus: signUpBonusSchema.optional(),
  annual_credits: z.record(dollarAmount).optional(),
  updated_at: z.string().optional(),
  added_at: z.string().optional(),
  scraped_at: z.string().optional(),
  source_url: z.string().optional(),
})

/** Ingested records must state their rewards and base rate explicitly. */
export const ingestedCardSchema = cardRecordSchema.extend({
  rewards: rewardsRecordSchema.extend({ base_rate: rate }),
})

export type CardRecord = z.infer<typeof cardRecordSchema>

// ─── Request Bodies ───────────────────────────────────────────────────────

export const spendingPlanSchema = z.record(dollarAmount)

export const optimizeRequestSchema = z.object({
  categories: spendingPlanSchema.default({}),
  preference: z.string().optional(),
})

export const cardReferenceSchema = z.object({ id: cardId }).strict()

export const addUserCardSchema = z.union([cardRecordSchema, cardReferenceSchema])

export const preferencesPatchSchema = z.object({
  reward_preference: preferenceSchema.optional(),
  monthly_spending: spendingPlanSchema.optional(),
})

export type OptimizeRequest = z.infer<typeof optimizeRequestSchema>
export type CardReference = z.infer<typeof cardReferenceSchema>
export type AddUserCardRequest = z.infer<typeof addUserCardSchema>
export type PreferencesPatch = z.infer<typeof preferencesPatchSchema>

// ─── Validation Functions ─────────────────────────────────────────────────

export interface ValidationIssue {
  path: string
  message: string
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; errors: ValidationIssue[] }

function validateWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data)
  if (result.success) return { valid: true, data: result.data, errors: [] }
  return {
    valid: false,
    errors: result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  }
}

export function validateCardRecord(data: unknown): ValidationResult<CardRecord> {
  return validateWith(cardRecordSchema, data)
}

/** Stricter check applied to records coming from a catalog provider */
export function validateIngestedCard(data: unknown): ValidationResult<CardRecord> {
  return validateWith(ingestedCardSchema, data)
}

export function validateOptimizeRequest(data: unknown): ValidationResult<OptimizeRequest> {
  return validateWith(optimizeRequestSchema, data)
}

export function validateAddUserCard(data: unknown): ValidationResult<AddUserCardRequest> {
  return validateWith(addUserCardSchema, data)
}

/** A bare `{ id }` body names a catalog card instead of carrying one. */
export function isCardReference(request: AddUserCardRequest): request is CardReference {
  return !('name' in request)
}

export function validatePreferencesPatch(data: unknown): ValidationResult<PreferencesPatch> {
  return validateWith(preferencesPatchSchema, data)
}

/**
 * Lenient read of a stored card list. Entries that no longer match the
 * record schema are dropped and counted instead of failing the whole list.
 */
export function parseCardList(raw: unknown): { records: CardRecord[]; dropped: number } {
  if (!Array.isArray(raw)) return { records: [], dropped: 0 }
  const records: CardRecord[] = []
  let dropped = 0
  for (const entry of raw) {
    const result = cardRecordSchema.safeParse(entry)
    if (result.success) records.push(result.data)
    else dropped++
  }
  return { records, dropped }
}
