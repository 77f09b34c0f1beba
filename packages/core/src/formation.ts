/**
 * Team formation: leader selection followed by round-robin assignment.
 */

import { Team, TeamSet } from "./team.js"
import { leaderCandidates, normalAttendees } from "./participants.js"
import { randomShuffler } from "./shuffle.js"
import { validateConfig } from "./validation.js"
import type { Shuffler } from "./shuffle.js"
import type { FormationConfig, Participant } from "./types.js"

/**
 * Build `numOfTeams` teams, each led by a candidate popped off the end of
 * `candidates`. Team 0 gets the first pop.
 *
 * `candidates` is consumed; whatever is left is returned as `rest`.
 * The caller guarantees there are at least `numOfTeams` candidates.
 */
export function createTeamsByLeaderCandidates(
  candidates: Array<Participant>,
  numOfTeams: number
): { teams: Array<Team>; rest: Array<Participant> } {
  const teams: Array<Team> = []

  while (teams.length < numOfTeams) {
    const leader = candidates.pop()
    if (!leader) {
      throw new RangeError(
        `Ran out of leader candidates after ${teams.length} of ${numOfTeams} teams`
      )
    }
    teams.push(new Team(leader))
  }

  return { teams, rest: candidates }
}

/**
 * Hand out `pool` one participant per team, popping from the end and
 * walking teams in creation order. Stops as soon as the pool is empty,
 * even mid-pass, so earlier teams end up with the extra members.
 */
export function assignRoundRobin(
  teams: ReadonlyArray<Team>,
  pool: Array<Participant>
): void {
  if (teams.length === 0) return

  while (pool.length > 0) {
    for (const team of teams) {
      const member = pool.pop()
      if (!member) break
      team.assign(member)
    }
  }
}

/**
 * Split the attendees of `config` into teams.
 *
 * Throws the config error from `validateConfig` when the config cannot
 * produce teams, and lets any error from `shuffler` propagate. Nothing is
 * returned in either case.
 *
 * @example
 * ```typescript
 * const teams = createTeams(
 *   {
 *     attendees: [
 *       { person: { name: `Ann` }, leader: true },
 *       { person: { name: `Bo` } },
 *     ],
 *     numOfTeams: 1,
 *   },
 *   identityShuffler
 * )
 * ```
 */
export function createTeams(
  config: FormationConfig,
  shuffler: Shuffler
): TeamSet {
  const validation = validateConfig(config)
  if (!validation.valid) {
    throw validation.error
  }

  const candidates = leaderCandidates(config)
  shuffler.shuffle(candidates)

  const { teams, rest } = createTeamsByLeaderCandidates(
    candidates,
    config.numOfTeams
  )

  rest.push(...normalAttendees(config))
  shuffler.shuffle(rest)

  assignRoundRobin(teams, rest)

  return new TeamSet(teams)
}

/**
 * Form teams with a fresh random shuffle.
 */
export function run(config: FormationConfig): TeamSet {
  return createTeams(config, randomShuffler)
}
