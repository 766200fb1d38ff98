import type { AuthOptions } from "./auth-options"

/**
 * Credentials for every cloud defined in one clouds.yaml, keyed by cloud name.
 *
 * Immutable once loaded; every accessor hands out copies.
 *
 * @example
 * ```typescript
 * const clouds = await loadClouds()
 *
 * clouds.get("devstack")  // { identityEndpoint: "http://...", username: "demo", ... }
 * clouds.getAll()         // { devstack: { ... }, prod: { ... } }
 * ```
 */
export interface ICloudsConfig {
  /**
   * Returns the credentials of one cloud.
   *
   * @throws CloudNotFoundError when no cloud with that name has an `auth` section.
   */
  get(name: string): AuthOptions

  /**
   * Returns a copy of all clouds keyed by name, or `undefined` when none
   * are defined.
   */
  getAll(): Record<string, AuthOptions> | undefined

  has(name: string): boolean

  /** Cloud names in file order. */
  names(): string[]
}
