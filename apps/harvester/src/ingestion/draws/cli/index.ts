import '../../../env.js'
import { classifyError } from '../../../config/errors.js'
import { loggers } from '../../../config/logger.js'
import { runAuditCommand } from './commands/audit.js'
import { runFetchCommand } from './commands/fetch.js'
import { asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('drawledger harvester')
  console.log('')
  console.log('Commands:')
  console.log('  fetch [--date YYYY-MM-DD] [--page-size N] [--max-pages N] [--store PATH]')
  console.log('        [--candidates PATH] [--artifacts DIR] [--dry-run] [--exit-code-on-change]')
  console.log('  audit [--store PATH]')
  console.log('')
  console.log('Exit codes: 0 ok, 2 usage or audit problems, 10 store changed (with --exit-code-on-change),')
  console.log('            74 store write failed, 78 configuration error, 1 unexpected error')
}

async function main(): Promise<number> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return 0
  }

  const flags = parseFlags(rest)
  if (flags.help === true) {
    printHelp()
    return 0
  }

  switch (command) {
    case 'fetch':
      return runFetchCommand({
        date: asString(flags.date),
        pageSize: asString(flags['page-size']),
        maxPages: asString(flags['max-pages']),
        store: asString(flags.store),
        candidates: asString(flags.candidates),
        artifacts: asString(flags.artifacts),
        dryRun: flags['dry-run'] === true,
        exitCodeOnChange: flags['exit-code-on-change'] === true,
      })
    case 'audit':
      return runAuditCommand({ store: asString(flags.store) })
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return 2
  }
}

main()
  .then(exitCode => {
    process.exitCode = exitCode
  })
  .catch(error => {
    const classified = classifyError(error)
    loggers.cli.error(
      classified.message,
      { code: classified.code, category: classified.category, ...classified.details },
      error
    )
    process.exitCode = classified.exitCode
  })
