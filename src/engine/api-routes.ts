/**
 * Cardwise Engine — HTTP Routes
 *
 * Request handlers behind the Netlify Functions in netlify/functions. Each
 * takes a web Request plus its collaborators and returns a JSON Response:
 *   success → { success: true, ... }
 *   failure → { error: true, message, code? }
 *
 * @module api-routes
 */

import type { CardCatalogProvider } from './card-catalog'
import { refreshCatalog } from './card-catalog'
import type { CardRepository } from './card-store'
import { SPENDING_CATEGORIES } from './category-synonyms'
import type { CardwiseConfig } from './config'
import type { RewardEnvironment } from './rate-resolver'
import { optimizeSpending, parsePreference } from './reward-optimizer'
import {
  isCardReference,
  validateAddUserCard,
  validateOptimizeRequest,
  validatePreferencesPatch,
  type CardRecord,
  type ValidationIssue,
} from './validation'

export interface RouteDeps {
  repository: CardRepository
  config: CardwiseConfig
  provider: CardCatalogProvider
  env?: RewardEnvironment
}

export type RouteHandler = (req: Request) => Promise<Response>

// ---- Helpers ----

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, X-User-Id',
}

export function json(data: object, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' },
  })
}

export function error(message: string, status = 400, code?: string, issues?: ValidationIssue[]): Response {
  return json({ error: true, message, code, issues }, status)
}

export function extractUserId(req: Request, config: CardwiseConfig): string {
  const header = req.headers.get('x-user-id')?.trim()
  return header ? header : config.defaultUserId
}

/** Resolve the caller and make sure their card list and preferences exist. */
async function resolveUser(req: Request, deps: RouteDeps): Promise<string> {
  const userId = extractUserId(req, deps.config)
  await deps.repository.initialize(userId)
  return userId
}

async function readBody(req: Request): Promise<unknown> {
  return req.json().catch(() => undefined)
}

function methodNotAllowed(req: Request): Response {
  return error(`Method ${req.method} not allowed`, 405, 'METHOD_NOT_ALLOWED')
}

/**
 * Common wrapper: answers CORS preflight, logs unexpected failures under the
 * given tag and turns them into a 500.
 */
export function createHandler(tag: string, route: RouteHandler): RouteHandler {
  return async (req: Request) => {
    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: CORS_HEADERS })
    }
    try {
      return await route(req)
    } catch (e) {
      console.error(`[${tag}]`, e)
      return error('Internal server error', 500)
    }
  }
}

// ---- Route Handlers ----

export async function handleCards(req: Request, deps: RouteDeps): Promise<Response> {
  if (req.method !== 'GET') return methodNotAllowed(req)
  const cards = await deps.repository.getAllCards()
  return json({ success: true, cards })
}

export async function handleUserCards(req: Request, deps: RouteDeps): Promise<Response> {
  const userId = await resolveUser(req, deps)

  switch (req.method) {
    case 'GET': {
      const cards = await deps.repository.getUserCards(userId)
      return json({ success: true, cards })
    }
    case 'POST': {
      const body = await readBody(req)
      if (body === undefined) return error('Request body must be JSON', 400, 'INVALID_JSON')

      const parsed = validateAddUserCard(body)
      if (!parsed.valid) return error('Invalid card', 400, 'VALIDATION_FAILED', parsed.errors)

      const request = parsed.data
      let record: CardRecord
      if (isCardReference(request)) {
        const known = await deps.repository.getCard(request.id)
        if (!known) return error(`Unknown card: ${request.id}`, 404, 'CARD_NOT_FOUND')
        record = known
      } else {
        record = request
      }

      const card = await deps.repository.addUserCard(userId, record)
      return json({ success: true, message: 'Card added successfully', card })
    }
    case 'DELETE': {
      const cardId = new URL(req.url).searchParams.get('id')
      if (!cardId) return error('Card id is required', 400, 'CARD_ID_REQUIRED')

      const removed = await deps.repository.removeUserCard(userId, cardId)
      if (!removed) return error(`Card not held: ${cardId}`, 404, 'CARD_NOT_FOUND')
      return json({ success: true, message: 'Card removed successfully' })
    }
    default:
      return methodNotAllowed(req)
  }
}

export async function handleOptimize(req: Request, deps: RouteDeps): Promise<Response> {
  if (req.method !== 'POST') return methodNotAllowed(req)

  const body = await readBody(req)
  if (body === undefined) return error('Request body must be JSON', 400, 'INVALID_JSON')

  const parsed = validateOptimizeRequest(body)
  if (!parsed.valid) return error('Invalid spending data', 400, 'VALIDATION_FAILED', parsed.errors)

  const userCards = await deps.repository.getUserCards(await resolveUser(req, deps))
  const optimization = optimizeSpending(
    userCards,
    parsed.data.categories,
    parsePreference(parsed.data.preference),
    deps.env,
  )

  return json({ success: true, optimization })
}

export async function handleCatalogUpdate(req: Request, deps: RouteDeps): Promise<Response> {
  if (req.method !== 'POST') return methodNotAllowed(req)

  const { updated, skipped } = await refreshCatalog(deps.provider, deps.repository)
  return json({ success: true, message: 'Card data updated successfully', updated, skipped })
}

export async function handleCategories(req: Request): Promise<Response> {
  if (req.method !== 'GET') return methodNotAllowed(req)
  return json({ success: true, categories: SPENDING_CATEGORIES })
}

export async function handlePreferences(req: Request, deps: RouteDeps): Promise<Response> {
  const userId = await resolveUser(req, deps)

  if (req.method === 'GET') {
    const preferences = await deps.repository.getUserPreferences(userId)
    return json({ success: true, preferences })
  }

  if (req.method === 'POST') {
    const body = await readBody(req)
    if (body === undefined) return error('Request body must be JSON', 400, 'INVALID_JSON')

    const parsed = validatePreferencesPatch(body)
    if (!parsed.valid) return error('Invalid preferences', 400, 'VALIDATION_FAILED', parsed.errors)

    const preferences = await deps.repository.updateUserPreferences(userId, parsed.data)
    return json({ success: true, preferences })
  }

  return methodNotAllowed(req)
}

export async function handleHealth(): Promise<Response> {
  return json({
    status: 'ok',
    service: 'cardwise',
    platform: 'netlify-functions',
    storage: 'netlify-blobs',
    timestamp: new Date().toISOString(),
  })
}
