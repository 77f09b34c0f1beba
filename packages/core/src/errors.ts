/**
 * Error classes raised by team formation.
 */

/**
 * Base class for all team formation errors.
 */
export class TeamFormationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = this.constructor.name
  }
}

/**
 * Raised when the requested number of teams is zero.
 */
export class ZeroTeamsError extends TeamFormationError {
  constructor() {
    super(`num_of_teams must be more than zero`)
  }
}

/**
 * Raised when the team count is negative, fractional, or beyond
 * `Number.MAX_SAFE_INTEGER`.
 * Settings loaders normally reject these before formation sees them.
 */
export class InvalidTeamCountError extends TeamFormationError {
  constructor(public readonly numOfTeams: number) {
    super(
      `num_of_teams must be a non-negative safe integer, got ${numOfTeams}`
    )
  }
}

/**
 * Raised when there are fewer leader candidates than teams to lead.
 * `available` is counted after the flat setting is applied.
 */
export class InsufficientLeadersError extends TeamFormationError {
  constructor(
    public readonly available: number,
    public readonly required: number
  ) {
    super(
      `num of leader candidates (${available}) must be equal or greater than num of teams (${required})`
    )
  }
}

/**
 * Raised when the randomness source fails while shuffling.
 * Not recoverable: it means the environment has no usable entropy.
 */
export class ShuffleError extends TeamFormationError {
  constructor(cause: unknown) {
    super(
      `Failed to shuffle: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
  }
}

/**
 * Errors that mean the config itself cannot produce teams.
 */
export type ConfigError =
  | ZeroTeamsError
  | InvalidTeamCountError
  | InsufficientLeadersError
