import { loadSettings } from '../../../../config/settings.js'
import { auditStoreFile } from '../../audit.js'

const MAX_PRINTED = 200

export interface AuditCommandArgs {
  store?: string
}

export async function runAuditCommand(
  args: AuditCommandArgs,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  const storePath = loadSettings(args.store ? { ...env, DRAW_STORE_PATH: args.store } : env).storePath
  const report = await auditStoreFile(storePath)

  for (const problem of report.problems.slice(0, MAX_PRINTED)) {
    const where = problem.index !== undefined ? `#${problem.index}` : '-'
    console.log(`${problem.kind.padEnd(16)} ${where.padEnd(7)} ${problem.period ?? ''} ${problem.message}`.trimEnd())
  }
  if (report.problems.length > MAX_PRINTED) {
    console.log(`... ${report.problems.length - MAX_PRINTED} more`)
  }

  console.log(
    `${storePath}: ${report.entries} entries, ${report.valid} valid, ${report.problems.length} problem(s)`
  )
  return report.problems.length > 0 ? 2 : 0
}
