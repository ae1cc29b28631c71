export * from './scraper/index.js'
export { createHarvestContext, createStore, loadSources, type HarvestContext } from './context.js'
export { loadSettings, retryPolicyOf, type HarvestSettings } from './config/settings.js'
export { BUILT_IN_SITES, loadSitesConfig, parseSitesConfig, type SourceDefaults } from './config/sites.js'
export { runCli } from './cli/run.js'
