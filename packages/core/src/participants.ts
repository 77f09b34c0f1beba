import type { AttendeeRecord, FormationConfig, Participant } from "./types.js"

/**
 * Whether an attendee may lead a team. An unset flag means no.
 */
export function isLeader(attendee: AttendeeRecord): boolean {
  return attendee.leader ?? false
}

/**
 * Whether the leader/non-leader distinction is switched off.
 */
export function isFlat(config: FormationConfig): boolean {
  return config.flat ?? false
}

/**
 * Every attendee's participant, in input order.
 */
export function allPeople(config: FormationConfig): Array<Participant> {
  return config.attendees.map((attendee) => attendee.person)
}

/**
 * Participants eligible to lead. In flat mode that is everyone.
 */
export function leaderCandidates(config: FormationConfig): Array<Participant> {
  if (isFlat(config)) {
    return allPeople(config)
  }
  return config.attendees
    .filter((attendee) => isLeader(attendee))
    .map((attendee) => attendee.person)
}

/**
 * Participants who can only be members. Empty in flat mode.
 */
export function normalAttendees(config: FormationConfig): Array<Participant> {
  if (isFlat(config)) {
    return []
  }
  return config.attendees
    .filter((attendee) => !isLeader(attendee))
    .map((attendee) => attendee.person)
}
