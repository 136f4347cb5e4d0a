/**
 * Cardwise — Core API (Health Check)
 */

import type { Config } from "@netlify/functions"
import { createHandler, handleHealth } from "../../src/engine/api-routes.ts"

export default createHandler("Core", () => handleHealth())

export const config: Config = {
  path: "/api/core",
}
