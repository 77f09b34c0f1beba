import { describe, expect, it } from "vitest"
import {
  allPeople,
  isFlat,
  isLeader,
  leaderCandidates,
  normalAttendees,
} from "../src/index.js"
import { attendee, fiveAttendees } from "./fixtures.js"

describe(`isLeader`, () => {
  it(`treats an unset flag as not a leader`, () => {
    expect(isLeader(attendee(`A`))).toBe(false)
  })

  it(`reads an explicit flag`, () => {
    expect(isLeader(attendee(`B`, false))).toBe(false)
    expect(isLeader(attendee(`C`, true))).toBe(true)
  })
})

describe(`isFlat`, () => {
  it(`reads the flat flag`, () => {
    expect(isFlat(fiveAttendees({ flat: true }))).toBe(true)
    expect(isFlat(fiveAttendees({ flat: false }))).toBe(false)
  })

  it(`defaults to false when unset`, () => {
    expect(isFlat({ attendees: [], numOfTeams: 1 })).toBe(false)
  })
})

describe(`classification`, () => {
  it(`splits leaders from normal attendees in input order`, () => {
    const config = fiveAttendees()

    expect(leaderCandidates(config).map((p) => p.name)).toEqual([`A`, `B`, `E`])
    expect(normalAttendees(config).map((p) => p.name)).toEqual([`C`, `D`])
    expect(allPeople(config).map((p) => p.name)).toEqual([
      `A`,
      `B`,
      `C`,
      `D`,
      `E`,
    ])
  })

  it(`makes everyone a leader candidate when flat`, () => {
    const config = fiveAttendees({ flat: true })

    expect(leaderCandidates(config).map((p) => p.name)).toEqual([
      `A`,
      `B`,
      `C`,
      `D`,
      `E`,
    ])
    expect(normalAttendees(config)).toEqual([])
    expect(allPeople(config)).toHaveLength(5)
  })

  it(`counts attendees without a flag as normal attendees`, () => {
    const config = {
      attendees: [attendee(`A`, true), attendee(`B`), attendee(`C`)],
      numOfTeams: 1,
    }

    expect(leaderCandidates(config)).toHaveLength(1)
    expect(normalAttendees(config).map((p) => p.name)).toEqual([`B`, `C`])
  })

  it(`keeps duplicate names as separate participants`, () => {
    const config = {
      attendees: [attendee(`Sam`, true), attendee(`Sam`, true)],
      numOfTeams: 2,
    }

    expect(leaderCandidates(config)).toHaveLength(2)
  })
})
