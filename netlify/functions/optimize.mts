/**
 * Cardwise — Spending Optimizer API
 *   POST /api/optimize — { categories: { [category]: monthlyAmount }, preference? }
 */

import type { Config } from "@netlify/functions"
import { createHandler, handleOptimize } from "../../src/engine/api-routes.ts"
import { createDeps } from "./_shared/deps.mts"

export default createHandler("Optimize", (req) => handleOptimize(req, createDeps()))

export const config: Config = {
  path: "/api/optimize",
}
