/**
 * Settings file loading.
 *
 * Settings are YAML (or JSON, which YAML also reads):
 *
 * ```yaml
 * num_of_teams: 2
 * flat: false
 * attendees:
 *   - person: { name: Ann }
 *     leader: true
 *   - person: { name: Bo }
 * ```
 *
 * Only the shape is checked here. Whether the numbers work out is decided
 * by `validateConfig` in the core.
 */

import { readFile } from "node:fs/promises"
import { YAMLParseError, parse as parseYaml } from "yaml"
import { z } from "zod"
import type { FormationConfig } from "@team-formation/core"

// =============================================================================
// Zod Schemas
// =============================================================================

export const ParticipantSchema = z.object({
  name: z.string().min(1),
})

export const AttendeeSchema = z.object({
  person: ParticipantSchema,
  leader: z.boolean().optional(),
})

export const SettingsSchema = z.object({
  attendees: z.array(AttendeeSchema),
  num_of_teams: z.number().int().nonnegative().safe(),
  flat: z.boolean().optional(),
})

export type Settings = z.infer<typeof SettingsSchema>

// =============================================================================
// Errors
// =============================================================================

/**
 * The settings could not be read, parsed, or did not have the right shape.
 * `issues` holds one `path: message` line per schema violation.
 */
export class SettingsError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string> = [],
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = `SettingsError`
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(`.`) : `(root)`
  return `${path}: ${issue.message}`
}

// =============================================================================
// Loading
// =============================================================================

export function toFormationConfig(settings: Settings): FormationConfig {
  return {
    attendees: settings.attendees,
    numOfTeams: settings.num_of_teams,
    flat: settings.flat,
  }
}

/**
 * Parse settings text. `source` names the input in error messages.
 */
export function parseSettings(
  text: string,
  source: string = `settings`
): FormationConfig {
  let raw: unknown
  try {
    raw = parseYaml(text)
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new SettingsError(
        `Failed to parse ${source}: ${error.message}`,
        [],
        { cause: error }
      )
    }
    throw error
  }

  const result = SettingsSchema.safeParse(raw)
  if (!result.success) {
    throw new SettingsError(
      `Invalid settings in ${source}`,
      result.error.issues.map(formatIssue)
    )
  }

  return toFormationConfig(result.data)
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && `code` in error && error.code === `ENOENT`
}

/**
 * Read and parse a settings file.
 */
export async function loadSettings(path: string): Promise<FormationConfig> {
  let text: string
  try {
    text = await readFile(path, `utf8`)
  } catch (error) {
    if (isNotFound(error)) {
      throw new SettingsError(`Settings file not found: ${path}`, [], {
        cause: error,
      })
    }
    const reason = error instanceof Error ? error.message : String(error)
    throw new SettingsError(
      `Failed to read settings file "${path}": ${reason}`,
      [],
      { cause: error }
    )
  }

  return parseSettings(text, path)
}
