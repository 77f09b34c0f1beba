/**
 * Domain checks run before any team is built.
 */

import {
  InsufficientLeadersError,
  InvalidTeamCountError,
  ZeroTeamsError,
} from "./errors.js"
import { leaderCandidates } from "./participants.js"
import type { ConfigError } from "./errors.js"
import type { FormationConfig } from "./types.js"

export type ConfigValidationResult =
  | { valid: true }
  | { valid: false; error: ConfigError }

/**
 * Check that a config can produce `numOfTeams` teams.
 * A zero team count is reported before any leader shortage.
 */
export function validateConfig(
  config: FormationConfig
): ConfigValidationResult {
  if (config.numOfTeams === 0) {
    return { valid: false, error: new ZeroTeamsError() }
  }
  if (!Number.isSafeInteger(config.numOfTeams) || config.numOfTeams < 0) {
    return { valid: false, error: new InvalidTeamCountError(config.numOfTeams) }
  }

  const available = leaderCandidates(config).length
  if (available < config.numOfTeams) {
    return {
      valid: false,
      error: new InsufficientLeadersError(available, config.numOfTeams),
    }
  }

  return { valid: true }
}
