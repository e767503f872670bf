import { loggers } from '../../../../config/logger.js'
import { loadCandidateFile, loadSettings } from '../../../../config/settings.js'
import { describeShape } from '../../explorer.js'
import { runHarvest, type HarvestOptions } from '../../harvest.js'

/** Exit code telling a scheduler the store file was rewritten. */
export const EXIT_STORE_CHANGED = 10

export interface FetchCommandArgs {
  date?: string
  pageSize?: string
  maxPages?: string
  store?: string
  candidates?: string
  artifacts?: string
  dryRun?: boolean
  exitCodeOnChange?: boolean
}

/**
 * Flags win over the environment for this run; validation stays in
 * loadSettings so a bad flag fails exactly like a bad variable.
 */
export function settingsOverrides(args: FetchCommandArgs): Record<string, string | undefined> {
  return {
    OPEN_DATE: args.date,
    PAGE_SIZE: args.pageSize,
    MAX_PAGES: args.maxPages,
    DRAW_STORE_PATH: args.store,
    DRAW_CANDIDATES_PATH: args.candidates,
    ARTIFACTS_DIR: args.artifacts,
  }
}

function withOverrides(
  env: Record<string, string | undefined>,
  overrides: Record<string, string | undefined>
): Record<string, string | undefined> {
  const next = { ...env }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) next[key] = value
  }
  return next
}

export async function runFetchCommand(
  args: FetchCommandArgs,
  env: Record<string, string | undefined> = process.env,
  options: Omit<HarvestOptions, 'dryRun'> = {}
): Promise<number> {
  const settings = loadSettings(withOverrides(env, settingsOverrides(args)))
  const candidates = await loadCandidateFile(settings.candidatesPath)

  const report = await runHarvest(settings, candidates, { ...options, dryRun: args.dryRun === true })

  loggers.cli.info('Fetch finished', {
    ...report,
    pinnedShape: report.pinnedShape ? describeShape(report.pinnedShape) : undefined,
    dryRun: args.dryRun === true,
  })

  return args.exitCodeOnChange === true && report.written ? EXIT_STORE_CHANGED : 0
}
