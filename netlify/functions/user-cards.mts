/**
 * Cardwise — User Cards API
 *   GET    /api/user/cards       — cards the caller holds
 *   POST   /api/user/cards       — add a card ({ id } from the catalog, or a full record)
 *   DELETE /api/user/cards?id=…  — drop a held card
 *
 * The caller is identified by the X-User-Id header (DEFAULT_USER_ID otherwise).
 */

import type { Config } from "@netlify/functions"
import { createHandler, handleUserCards } from "../../src/engine/api-routes.ts"
import { createDeps } from "./_shared/deps.mts"

export default createHandler("UserCards", (req) => handleUserCards(req, createDeps()))

export const config: Config = {
  path: "/api/user/cards",
}
