/**
 * Cardwise — Catalog Refresh
 *   POST /api/catalog/update — pull the issuer feed and merge it into the catalog
 */

import type { Config } from "@netlify/functions"
import { createHandler, handleCatalogUpdate } from "../../src/engine/api-routes.ts"
import { createDeps } from "./_shared/deps.mts"

export default createHandler("Catalog", (req) => handleCatalogUpdate(req, createDeps()))

export const config: Config = {
  path: "/api/catalog/update",
}
