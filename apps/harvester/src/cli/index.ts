import '../env.js'
import { runCli } from './run.js'
import { errorMessage } from '../scraper/errors.js'

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2))
  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(errorMessage(error))
  process.exit(1)
})
