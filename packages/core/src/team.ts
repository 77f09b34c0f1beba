import { TeamFormationError } from "./errors.js"
import type { Participant, TeamSetSnapshot, TeamSnapshot } from "./types.js"

/**
 * One leader and the members assigned to them, in assignment order.
 */
export class Team {
  readonly leader: Participant
  private readonly assigned: Array<Participant> = []
  private sealed = false

  constructor(leader: Participant) {
    this.leader = Object.freeze({ ...leader })
  }

  /**
   * Append a member. The caller makes sure nobody is assigned twice.
   * Throws once the team belongs to a `TeamSet`.
   */
  assign(member: Participant): void {
    if (this.sealed) {
      throw new TeamFormationError(
        `Team led by ${this.leader.name} is sealed; members cannot be added after formation`
      )
    }
    this.assigned.push({ ...member })
  }

  /** Snapshot of the members; later assignments do not show up in it */
  get members(): ReadonlyArray<Participant> {
    return Object.freeze([...this.assigned])
  }

  /** Stop accepting members. Called by `TeamSet`. */
  seal(): void {
    this.sealed = true
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /** Leader plus members */
  get size(): number {
    return this.assigned.length + 1
  }

  toJSON(): TeamSnapshot {
    return {
      leader: { ...this.leader },
      members: this.assigned.map((member) => ({ ...member })),
    }
  }
}

/**
 * Teams in creation order. Seals every team it is given, so neither the
 * list nor any team's members change after formation returns it.
 */
export class TeamSet implements Iterable<Team> {
  readonly teams: ReadonlyArray<Team>

  constructor(teams: Iterable<Team>) {
    this.teams = Object.freeze([...teams])
    for (const team of this.teams) {
      team.seal()
    }
  }

  get length(): number {
    return this.teams.length
  }

  at(index: number): Team | undefined {
    return this.teams[index]
  }

  [Symbol.iterator](): Iterator<Team> {
    return this.teams[Symbol.iterator]()
  }

  toJSON(): TeamSetSnapshot {
    return { teams: this.teams.map((team) => team.toJSON()) }
  }
}
