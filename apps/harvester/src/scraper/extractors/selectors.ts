/**
 * Where addresses usually live on listing pages, most specific first.
 */
export const SELECTORS = {
  jsonLd: 'script[type="application/ld+json"]',
  addressRegions: [
    'address',
    '[class*="address"]',
    '[class*="location"]',
    '[class*="listing"]',
    '[class*="property"]',
  ],
  /** Stripped before any text is read */
  nonContent: 'script, style, noscript, template',
  /** Rendered as line breaks when reading text */
  blockElements:
    'address, article, aside, blockquote, dd, div, dl, dt, footer, h1, h2, h3, h4, h5, h6, header, li, main, nav, ol, p, section, table, tbody, td, th, tr, ul',
} as const
