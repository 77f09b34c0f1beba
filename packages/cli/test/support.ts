import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import type { CliIo } from "../src/index.js"

export const FIVE_ATTENDEES_YAML = `num_of_teams: 2
flat: false
attendees:
  - person: { name: A }
    leader: true
  - person: { name: B }
    leader: true
  - person: { name: C }
    leader: false
  - person: { name: D }
  - person: { name: E }
    leader: true
`

export interface CapturedIo extends CliIo {
  out: () => string
  err: () => string
}

export function captureIo(env: Record<string, string | undefined> = {}): CapturedIo {
  let out = ``
  let err = ``
  return {
    stdout: {
      write: (chunk: string) => {
        out += chunk
        return true
      },
    },
    stderr: {
      write: (chunk: string) => {
        err += chunk
        return true
      },
    },
    env,
    out: () => out,
    err: () => err,
  }
}

/**
 * A scratch directory for settings files, removed by `cleanup`.
 */
export async function createScratchDir(): Promise<{
  write: (name: string, content: string) => Promise<string>
  path: (name: string) => string
  cleanup: () => Promise<void>
}> {
  const dir = await mkdtemp(join(tmpdir(), `team-formation-`))
  return {
    write: async (name, content) => {
      const file = join(dir, name)
      await writeFile(file, content, `utf8`)
      return file
    },
    path: (name) => join(dir, name),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  }
}
