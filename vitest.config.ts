import { fileURLToPath } from "node:url"
import { defineConfig, defineProject } from "vitest/config"

const alias = {
  "@team-formation/core": fileURLToPath(
    new URL(`./packages/core/src/index.ts`, import.meta.url)
  ),
}

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: `core`,
          include: [`packages/core/test/**/*.test.ts`],
          exclude: [`**/node_modules/**`],
        },
        resolve: { alias },
      }),
      defineProject({
        test: {
          name: `cli`,
          include: [`packages/cli/test/**/*.test.ts`],
          exclude: [`**/node_modules/**`],
        },
        resolve: { alias },
      }),
    ],
    coverage: {
      provider: `v8`,
      reporter: [`text`, `json`, `html`],
    },
  },
})
