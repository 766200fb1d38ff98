import { CloudNotFoundError } from "../errors/errors"
import type { AuthOptions } from "../ports/auth-options"
import type { ICloudsConfig } from "../ports/clouds-config"

export class CloudsConfig implements ICloudsConfig {
  private readonly clouds: ReadonlyMap<string, Readonly<AuthOptions>>

  constructor(clouds: Iterable<readonly [string, AuthOptions]>) {
    const entries = new Map<string, Readonly<AuthOptions>>()

    for (const [name, auth] of clouds) {
      entries.set(name, Object.freeze({ ...auth }))
    }

    this.clouds = entries
    Object.freeze(this)
  }

  get(name: string): AuthOptions {
    const auth = this.clouds.get(name)

    if (!auth) throw CloudNotFoundError.forCloud(name)

    return { ...auth }
  }

  getAll(): Record<string, AuthOptions> | undefined {
    if (this.clouds.size === 0) return undefined

    const copies: [string, AuthOptions][] = []

    for (const [name, auth] of this.clouds) {
      copies.push([name, { ...auth }])
    }

    return Object.fromEntries(copies)
  }

  has(name: string): boolean {
    return this.clouds.has(name)
  }

  names(): string[] {
    return [...this.clouds.keys()]
  }
}
