import { stringify as stringifyYaml } from "yaml"
import type { TeamSet } from "@team-formation/core"

export type OutputFormat = `yaml` | `json` | `text`

export const OUTPUT_FORMATS: ReadonlyArray<OutputFormat> = [
  `yaml`,
  `json`,
  `text`,
]

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value)
}

/**
 * Human-readable listing, one block per team.
 */
function renderText(teamSet: TeamSet): string {
  const blocks = teamSet.teams.map((team, index) => {
    const members =
      team.members.length > 0
        ? team.members.map((member) => member.name).join(`, `)
        : `(none)`
    return [
      `Team ${index + 1}`,
      `  leader: ${team.leader.name}`,
      `  members: ${members}`,
    ].join(`\n`)
  })
  return `${blocks.join(`\n\n`)}\n`
}

export function renderTeams(teamSet: TeamSet, format: OutputFormat): string {
  switch (format) {
    case `yaml`:
      return stringifyYaml(teamSet.toJSON())
    case `json`:
      return `${JSON.stringify(teamSet.toJSON(), null, 2)}\n`
    case `text`:
      return renderText(teamSet)
  }
}
