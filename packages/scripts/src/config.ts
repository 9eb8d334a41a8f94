/**
 * Settings for the conversion scripts
 *
 * Read from PAPYRUS_* environment variables, then overridden by CLI flags.
 */

import { resolve, join } from 'path'
import { z } from 'zod'

const DEFAULT_REPO_URL = 'https://github.com/papyri/idp.data.git'

const BooleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes')

const SettingsSchema = z.object({
  debug: BooleanFlag,
  ignoreFormattingIssues: BooleanFlag,
  writeJson: BooleanFlag,
  writeTxt: BooleanFlag,
  dataDir: z.string().min(1),
  idpDataDir: z.string().min(1),
  indexFile: z.string().min(1),
  exportDir: z.string().min(1),
  alwaysUpdate: BooleanFlag,
  alwaysIndex: BooleanFlag,
  repoUrl: z.string().url()
})

export type Settings = z.output<typeof SettingsSchema>

export class SettingsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SettingsError'
  }
}

/** Flags that switch a setting, with the value they set */
const FLAG_OVERRIDES: Record<string, Partial<Settings>> = {
  '--debug': { debug: true },
  '--ignore-formatting-issues': { ignoreFormattingIssues: true },
  '--no-json': { writeJson: false },
  '--no-txt': { writeTxt: false },
  '--update': { alwaysUpdate: true },
  '--reindex': { alwaysIndex: true }
}

export const loadSettings = (env: NodeJS.ProcessEnv = process.env, argv: string[] = []): Settings => {
  const dataDir = resolve(env.PAPYRUS_DATA_DIR || './papyri_data')

  const raw = {
    debug: (env.PAPYRUS_DEBUG || 'false').toLowerCase(),
    ignoreFormattingIssues: (env.PAPYRUS_IGNORE_FORMATTING_ISSUES || 'false').toLowerCase(),
    writeJson: (env.PAPYRUS_WRITE_JSON || 'true').toLowerCase(),
    writeTxt: (env.PAPYRUS_WRITE_TXT || 'true').toLowerCase(),
    dataDir,
    idpDataDir: resolve(env.PAPYRUS_IDP_DATA_DIR || join(dataDir, 'idp.data')),
    indexFile: resolve(env.PAPYRUS_INDEX_FILE || join(dataDir, 'tm_index.json')),
    exportDir: resolve(env.PAPYRUS_EXPORT_DIR || './export'),
    alwaysUpdate: (env.PAPYRUS_ALWAYS_UPDATE || 'false').toLowerCase(),
    alwaysIndex: (env.PAPYRUS_ALWAYS_INDEX || 'false').toLowerCase(),
    repoUrl: env.PAPYRUS_REPO_URL || DEFAULT_REPO_URL
  }

  const result = SettingsSchema.safeParse(raw)
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new SettingsError(`Invalid settings: ${details}`, { cause: result.error })
  }

  let settings = result.data
  for (const arg of argv) {
    const override = FLAG_OVERRIDES[arg]
    if (override) settings = { ...settings, ...override }
  }
  return settings
}

// ============ Command line ============

export type FilterSource = 'dclp' | 'ddb' | 'all'

export interface FilterArgs {
  source: FilterSource
  title?: string
  place?: string
  dclpHybrid?: string
  singleMatchSuffices: boolean
}

export type CliCommand =
  | { command: 'convert'; file: string }
  | { command: 'run'; target: number | number[] | string | string[] }
  | { command: 'filter'; filter: FilterArgs }
  | { command: 'help' }

const VALUE_FLAGS = new Set(['--filter', '--title', '--place', '--dclp-hybrid'])

const isFilterSource = (value: string): value is FilterSource =>
  value === 'dclp' || value === 'ddb' || value === 'all'

/**
 * Split argv into a command. Setting flags are ignored here, see loadSettings.
 */
export const parseCliArgs = (argv: string[]): CliCommand => {
  const positional: string[] = []
  const values = new Map<string, string>()
  let allMatch = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1]
      if (value === undefined || value.startsWith('--')) {
        throw new SettingsError(`Missing value for ${arg}`)
      }
      values.set(arg, value)
      i++
    } else if (arg === '--all-match') {
      allMatch = true
    } else if (arg === '--help' || arg === '-h') {
      return { command: 'help' }
    } else if (!arg.startsWith('--')) {
      positional.push(...arg.split(',').filter(Boolean))
    }
  }

  const source = values.get('--filter')
  if (source !== undefined) {
    if (!isFilterSource(source)) {
      throw new SettingsError(`Unknown filter source "${source}", expected dclp, ddb or all`)
    }
    return {
      command: 'filter',
      filter: {
        source,
        title: values.get('--title'),
        place: values.get('--place'),
        dclpHybrid: values.get('--dclp-hybrid'),
        singleMatchSuffices: !allMatch
      }
    }
  }

  if (positional[0] === 'convert') {
    const file = positional[1]
    if (!file) throw new SettingsError('convert needs an XML file path')
    return { command: 'convert', file }
  }

  if (positional.length === 0) {
    return { command: 'help' }
  }

  if (positional.every(arg => /^\d+$/.test(arg))) {
    const numbers = positional.map(arg => Number.parseInt(arg, 10))
    return { command: 'run', target: numbers.length === 1 ? numbers[0] : numbers }
  }
  return { command: 'run', target: positional.length === 1 ? positional[0] : positional }
}
