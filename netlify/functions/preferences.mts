/**
 * Cardwise — User Preferences API
 *   GET  /api/user/preferences
 *   POST /api/user/preferences — { reward_preference?, monthly_spending? }
 */

import type { Config } from "@netlify/functions"
import { createHandler, handlePreferences } from "../../src/engine/api-routes.ts"
import { createDeps } from "./_shared/deps.mts"

export default createHandler("Preferences", (req) => handlePreferences(req, createDeps()))

export const config: Config = {
  path: "/api/user/preferences",
}
