import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { CloudsSource } from "../clouds-source"

export type CloudsSourceHarness = {
  name: string
  make: (cwd: string) => Promise<{
    source: CloudsSource
    cleanup?: () => Promise<void>
  }>
  setup: (cwd: string) => Promise<void>
  expectedValue: () => Record<string, unknown>
}

export function describeCloudsSourceContract(h: CloudsSourceHarness) {
  describe(`${h.name} (CloudsSource contract)`, () => {
    let cwd: string
    let source: CloudsSource
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "clouds-source-"))
      await h.setup(cwd)
      const result = await h.make(cwd)

      source = result.source
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty location", () => {
      expect(typeof source.location).toBe("string")
      expect(source.location.length).toBeGreaterThan(0)
    })

    it("load() resolves to a plain object", async () => {
      const result = await source.load()

      expect(result).not.toBeNull()
      expect(Array.isArray(result)).toBe(false)
      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("load() is idempotent", async () => {
      const a = await source.load()
      const b = await source.load()

      expect(b).toEqual(a)
    })

    it("load() does not leak a mutable reference", async () => {
      const first = await source.load()
      first.__CLOUDS_TEST_MUTATION__ = "x"

      const second = await source.load()
      expect(second).not.toHaveProperty("__CLOUDS_TEST_MUTATION__")
    })

    it("load() returns the expected document", async () => {
      const result = await source.load()

      expect(result).toEqual(h.expectedValue())
    })
  })
}
