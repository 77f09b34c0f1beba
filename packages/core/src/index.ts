/**
 * @team-formation/core
 *
 * Splits attendees into a fixed number of teams. Each team gets one leader
 * drawn from the leader candidates; everyone else is shuffled and dealt out
 * round-robin, so member counts differ by at most one.
 *
 * @example
 * ```typescript
 * import { createTeams, randomShuffler } from "@team-formation/core"
 *
 * const teamSet = createTeams(config, randomShuffler)
 * for (const team of teamSet) {
 *   console.log(team.leader.name, team.members.map((m) => m.name))
 * }
 * ```
 */

export {
  InsufficientLeadersError,
  InvalidTeamCountError,
  ShuffleError,
  TeamFormationError,
  ZeroTeamsError,
} from "./errors.js"

export {
  assignRoundRobin,
  createTeams,
  createTeamsByLeaderCandidates,
  run,
} from "./formation.js"

export {
  allPeople,
  isFlat,
  isLeader,
  leaderCandidates,
  normalAttendees,
} from "./participants.js"

export {
  SHUFFLE_STRATEGIES,
  getShuffler,
  identityShuffler,
  isShuffleStrategy,
  randomShuffler,
} from "./shuffle.js"

export { Team, TeamSet } from "./team.js"

export { validateConfig } from "./validation.js"

export type { ConfigError } from "./errors.js"
export type { Shuffler, ShuffleStrategy } from "./shuffle.js"
export type { ConfigValidationResult } from "./validation.js"
export type {
  AttendeeRecord,
  FormationConfig,
  Participant,
  TeamSetSnapshot,
  TeamSnapshot,
} from "./types.js"
