#!/usr/bin/env node

import { existsSync, realpathSync } from "node:fs"
import { resolve as resolvePath } from "node:path"
import { fileURLToPath } from "node:url"
import {
  InsufficientLeadersError,
  ShuffleError,
  TeamFormationError,
  createTeams,
  getShuffler,
  leaderCandidates,
  normalAttendees,
} from "@team-formation/core"
import { FORMAT_ENV_VAR, parseArgs } from "./parseArgs.js"
import { renderTeams } from "./render.js"
import { SettingsError, loadSettings, parseSettings } from "./settings.js"
import type { FormationConfig } from "@team-formation/core"
import type { ParsedArgs } from "./parseArgs.js"
import type { OutputFormat } from "./render.js"

export type { OutputFormat, ParsedArgs }
export { parseArgs, renderTeams, loadSettings, parseSettings, SettingsError }

/**
 * Where the command writes. Defaults to the process streams.
 */
export interface CliIo {
  stdout: { write: (chunk: string) => unknown }
  stderr: { write: (chunk: string) => unknown }
  env: Record<string, string | undefined>
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function getUsageText(): string {
  return `
Usage:
  team-formation <settings_file> [options]    Split attendees into teams

Options:
  --teams <n>             Number of teams (overrides num_of_teams)
  --flat                  Treat every attendee as a leader candidate
  --format <format>       Output format: yaml, json or text (default: yaml)
  --json                  Shorthand for --format json
  --shuffle <strategy>    Shuffle strategy: random or none (default: random)
  --no-shuffle            Shorthand for --shuffle none
  --verbose, -v           Print diagnostics to stderr
  --help, -h              Show this help message

Settings file (YAML or JSON):
  num_of_teams: 2
  flat: false
  attendees:
    - person: { name: Ann }
      leader: true
    - person: { name: Bo }

Environment Variables:
  ${FORMAT_ENV_VAR}   Default output format (overridden by --format)
`
}

function applyOverrides(
  config: FormationConfig,
  args: ParsedArgs
): FormationConfig {
  return {
    ...config,
    numOfTeams: args.teams ?? config.numOfTeams,
    flat: args.flat || config.flat,
  }
}

/**
 * Run the command and return its exit code.
 */
export async function runCli(
  args: Array<string>,
  io: CliIo = { stdout: process.stdout, stderr: process.stderr, env: process.env }
): Promise<number> {
  const { stdout, stderr } = io

  let parsed: ParsedArgs
  try {
    parsed = parseArgs(args, io.env)
  } catch (error) {
    stderr.write(`Error: ${getErrorMessage(error)}\n`)
    stderr.write(`  Run "team-formation --help" for usage information\n`)
    return 1
  }

  if (parsed.help || !parsed.settingsPath) {
    stdout.write(getUsageText())
    return 0
  }

  const debug = (message: string) => {
    if (parsed.verbose) {
      stderr.write(`[team-formation] ${message}\n`)
    }
  }

  let config: FormationConfig
  try {
    config = applyOverrides(await loadSettings(parsed.settingsPath), parsed)
  } catch (error) {
    if (!(error instanceof SettingsError)) throw error
    stderr.write(`Error: ${error.message}\n`)
    for (const issue of error.issues) {
      stderr.write(`  ${issue}\n`)
    }
    return 1
  }

  debug(
    `loaded ${config.attendees.length} attendees from ${parsed.settingsPath}`
  )
  debug(
    `${leaderCandidates(config).length} leader candidates, ${normalAttendees(config).length} other attendees, ${config.numOfTeams} teams (flat: ${config.flat ?? false})`
  )
  debug(`shuffle: ${parsed.shuffle}`)

  let output: string
  try {
    const teamSet = createTeams(config, getShuffler(parsed.shuffle))
    debug(
      `member counts: ${teamSet.teams.map((team) => team.members.length).join(`, `)}`
    )
    output = renderTeams(teamSet, parsed.format)
  } catch (error) {
    if (!(error instanceof TeamFormationError)) throw error
    if (error instanceof ShuffleError) {
      stderr.write(`Fatal error: ${error.message}\n`)
      return 1
    }
    stderr.write(`Error: ${error.message}\n`)
    if (error instanceof InsufficientLeadersError) {
      stderr.write(
        `  Mark more attendees with "leader: true", lower num_of_teams, or pass --flat\n`
      )
    }
    return 1
  }

  stdout.write(output)
  return 0
}

async function main() {
  const exitCode = await runCli(process.argv.slice(2))
  process.exit(exitCode)
}

/**
 * Whether `scriptPath` (normally `process.argv[1]`) is this module.
 * Both sides go through realpath: npm installs `bin` entries as symlinks,
 * and argv holds the link while `import.meta.url` holds the target.
 */
export function isMainModule(
  scriptPath: string | undefined = process.argv[1],
  moduleUrl: string = import.meta.url
): boolean {
  if (!scriptPath) return false
  const resolved = resolvePath(scriptPath)
  if (!existsSync(resolved)) return false
  return realpathSync(resolved) === realpathSync(fileURLToPath(moduleUrl))
}

if (isMainModule()) {
  main().catch((error: unknown) => {
    process.stderr.write(`Fatal error: ${getErrorMessage(error)}\n`)
    process.exit(1)
  })
}
