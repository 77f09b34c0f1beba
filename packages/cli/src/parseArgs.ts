import { isShuffleStrategy } from "@team-formation/core"
import { OUTPUT_FORMATS, isOutputFormat } from "./render.js"
import type { ShuffleStrategy } from "@team-formation/core"
import type { OutputFormat } from "./render.js"

export const FORMAT_ENV_VAR = `TEAM_FORMATION_FORMAT`

export interface ParsedArgs {
  /** Required unless `help` is set */
  settingsPath?: string
  format: OutputFormat
  shuffle: ShuffleStrategy
  /** Overrides `num_of_teams` from the settings file */
  teams?: number
  /** Forces flat mode on; the settings file cannot be overridden to false */
  flat: boolean
  verbose: boolean
  help: boolean
}

/**
 * Extract a flag value from args, supporting both --flag=value and --flag value syntax.
 * Returns { value, consumed } where consumed is the number of args used (0 if no match).
 */
function extractFlagValue(
  args: Array<string>,
  index: number,
  flagName: string
): { value: string | null; consumed: number } {
  const arg = args[index]
  const prefix = `${flagName}=`

  if (arg?.startsWith(prefix)) {
    const value = arg.slice(prefix.length)
    if (!value) {
      throw new Error(`${flagName} requires a value`)
    }
    return { value, consumed: 1 }
  }

  if (arg === flagName) {
    const value = args[index + 1]
    if (!value || value.startsWith(`--`)) {
      throw new Error(`${flagName} requires a value`)
    }
    return { value, consumed: 2 }
  }

  return { value: null, consumed: 0 }
}

function parseFormat(value: string, origin: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new Error(
      `Invalid ${origin}: "${value}"\n  Expected one of: ${OUTPUT_FORMATS.join(`, `)}`
    )
  }
  return value
}

function parseTeamCount(value: string): number {
  const teams = /^\d+$/.test(value) ? Number(value) : Number.NaN
  if (!Number.isSafeInteger(teams) || teams < 1) {
    throw new Error(`--teams must be a positive whole number, got "${value}"`)
  }
  return teams
}

/**
 * Parse command-line arguments (without the node and script paths).
 * `env` supplies the default output format through TEAM_FORMATION_FORMAT.
 * @throws Error on unknown flags, missing values, or a missing settings path
 */
export function parseArgs(
  args: Array<string>,
  env: Record<string, string | undefined> = {}
): ParsedArgs {
  const envFormat = env[FORMAT_ENV_VAR]
  const parsed: ParsedArgs = {
    format: envFormat
      ? parseFormat(envFormat, `${FORMAT_ENV_VAR} environment variable`)
      : `yaml`,
    shuffle: `random`,
    flat: false,
    verbose: false,
    help: false,
  }
  const positionals: Array<string> = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === undefined) continue

    if (arg === `--help` || arg === `-h`) {
      parsed.help = true
      continue
    }

    if (arg === `--verbose` || arg === `-v`) {
      parsed.verbose = true
      continue
    }

    if (arg === `--json`) {
      parsed.format = `json`
      continue
    }

    if (arg === `--flat`) {
      parsed.flat = true
      continue
    }

    if (arg === `--no-shuffle`) {
      parsed.shuffle = `none`
      continue
    }

    const formatResult = extractFlagValue(args, i, `--format`)
    if (formatResult.value !== null) {
      parsed.format = parseFormat(formatResult.value, `--format value`)
      i += formatResult.consumed - 1
      continue
    }

    const shuffleResult = extractFlagValue(args, i, `--shuffle`)
    if (shuffleResult.value !== null) {
      if (!isShuffleStrategy(shuffleResult.value)) {
        throw new Error(
          `Invalid --shuffle value: "${shuffleResult.value}"\n  Expected one of: none, random`
        )
      }
      parsed.shuffle = shuffleResult.value
      i += shuffleResult.consumed - 1
      continue
    }

    const teamsResult = extractFlagValue(args, i, `--teams`)
    if (teamsResult.value !== null) {
      parsed.teams = parseTeamCount(teamsResult.value)
      i += teamsResult.consumed - 1
      continue
    }

    if (arg.startsWith(`-`)) {
      throw new Error(`unknown flag: ${arg}`)
    }

    positionals.push(arg)
  }

  if (positionals.length > 1) {
    throw new Error(
      `Expected a single settings file, got ${positionals.length}: ${positionals.join(`, `)}`
    )
  }

  parsed.settingsPath = positionals[0]
  if (!parsed.settingsPath && !parsed.help) {
    throw new Error(`Missing settings file\n  Usage: team-formation <settings_file>`)
  }

  return parsed
}
