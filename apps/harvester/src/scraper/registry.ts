/**
 * Extractor Registry
 *
 * Extractors are registered explicitly when the harvest context is built;
 * there is no auto-discovery and no process-wide instance.
 */

import type { Extractor, ExtractorRegistry } from './types.js'

export class InMemoryExtractorRegistry implements ExtractorRegistry {
  private readonly extractors = new Map<string, Extractor>()

  /**
   * @throws Error if an extractor with the same id is already registered
   */
  register(extractor: Extractor): void {
    if (this.extractors.has(extractor.id)) {
      throw new Error(`Extractor with ID '${extractor.id}' is already registered`)
    }
    this.extractors.set(extractor.id, extractor)
  }

  get(id: string): Extractor | undefined {
    return this.extractors.get(id)
  }

  has(id: string): boolean {
    return this.extractors.has(id)
  }

  list(): string[] {
    return Array.from(this.extractors.keys())
  }

  size(): number {
    return this.extractors.size
  }
}
