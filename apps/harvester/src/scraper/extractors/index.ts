import { InMemoryExtractorRegistry } from '../registry.js'
import type { Extractor, ExtractorRegistry } from '../types.js'
import { landingPageExtractor } from './landing-page.js'
import { listingIndexExtractor } from './listing-index.js'

export const BUILT_IN_EXTRACTORS: readonly Extractor[] = [landingPageExtractor, listingIndexExtractor]

/** Registry with the built-in extractors plus any extras (e.g. a browser-backed one). */
export function createExtractorRegistry(extra: readonly Extractor[] = []): ExtractorRegistry {
  const registry = new InMemoryExtractorRegistry()
  for (const extractor of [...BUILT_IN_EXTRACTORS, ...extra]) {
    registry.register(extractor)
  }
  return registry
}

export { landingPageExtractor, landingDiscoverySchema } from './landing-page.js'
export { listingIndexExtractor, listingIndexDiscoverySchema } from './listing-index.js'
export { MAX_DISCOVERY_PAGES } from './discovery.js'
export {
  DEFAULT_STRATEGIES,
  addressRegionStrategy,
  extractCandidates,
  jsonLdStrategy,
  zipTextScanStrategy,
  type AddressStrategy,
} from './strategies.js'
export { isLikelyAddress, isPlausibleAddressText, parseAddressLine, type ParsedAddress } from './address-parser.js'
