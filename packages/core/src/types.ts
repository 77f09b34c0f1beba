/**
 * Team Formation Type Definitions
 */

// ============================================================================
// Input Types
// ============================================================================

/**
 * Someone taking part. Names are not required to be unique.
 */
export interface Participant {
  readonly name: string
}

/**
 * A participant as listed in the settings, with optional leader eligibility.
 */
export interface AttendeeRecord {
  readonly person: Participant
  /** Unset means not eligible to lead */
  readonly leader?: boolean
}

/**
 * Everything formation needs, already checked for shape by the caller.
 */
export interface FormationConfig {
  readonly attendees: ReadonlyArray<AttendeeRecord>
  /** Number of teams to create; must be positive */
  readonly numOfTeams: number
  /** Treat every attendee as a leader candidate. Unset means false. */
  readonly flat?: boolean
}

// ============================================================================
// Output Types
// ============================================================================

/**
 * Plain representation of a team, as produced by `TeamSet.toJSON()`.
 */
export interface TeamSnapshot {
  leader: Participant
  members: Array<Participant>
}

export interface TeamSetSnapshot {
  teams: Array<TeamSnapshot>
}
