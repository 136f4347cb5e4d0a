/**
 * Cardwise — Card Catalog API
 *   GET /api/cards — every card in the catalog
 */

import type { Config } from "@netlify/functions"
import { createHandler, handleCards } from "../../src/engine/api-routes.ts"
import { createDeps } from "./_shared/deps.mts"

export default createHandler("Cards", (req) => handleCards(req, createDeps()))

export const config: Config = {
  path: "/api/cards",
}
