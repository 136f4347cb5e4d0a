// Cardwise — spending categories offered to users

import type { Config } from "@netlify/functions"
import { createHandler, handleCategories } from "../../src/engine/api-routes.ts"

export default createHandler("Categories", (req) => handleCategories(req))

export const config: Config = { path: "/api/categories" }
