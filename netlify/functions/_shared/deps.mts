/**
 * Shared wiring for the Cardwise functions: settings from the environment,
 * a Blobs-backed repository and the static catalog feed.
 */

import { StaticCatalogProvider } from "../../../src/engine/card-catalog.ts"
import { BlobsKeyValueStore, CardRepository } from "../../../src/engine/card-store.ts"
import { loadConfig } from "../../../src/engine/config.ts"
import type { RouteDeps } from "../../../src/engine/api-routes.ts"

export function createDeps(): RouteDeps {
  const config = loadConfig()
  const repository = new CardRepository(new BlobsKeyValueStore(config.storeName), {
    seedDefaultCatalog: config.seedDefaultCatalog,
    defaultPreference: config.defaultPreference,
  })
  return { repository, config, provider: new StaticCatalogProvider() }
}
