import type { AttendeeRecord, FormationConfig, TeamSet } from "../src/index.js"

export function attendee(name: string, leader?: boolean): AttendeeRecord {
  return leader === undefined ? { person: { name } } : { person: { name }, leader }
}

/**
 * A, B and E may lead; C and D may not.
 */
export function fiveAttendees(
  overrides: Partial<FormationConfig> = {}
): FormationConfig {
  return {
    attendees: [
      attendee(`A`, true),
      attendee(`B`, true),
      attendee(`C`, false),
      attendee(`D`, false),
      attendee(`E`, true),
    ],
    numOfTeams: 2,
    flat: false,
    ...overrides,
  }
}

export function names(teamSet: TeamSet): Array<{
  leader: string
  members: Array<string>
}> {
  return teamSet.teams.map((team) => ({
    leader: team.leader.name,
    members: team.members.map((member) => member.name),
  }))
}

export function everyoneIn(teamSet: TeamSet): Array<string> {
  return names(teamSet).flatMap((team) => [team.leader, ...team.members])
}
