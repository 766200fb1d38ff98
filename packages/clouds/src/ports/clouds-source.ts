/**
 * A source of the raw clouds.yaml document.
 *
 * A source only reads and decodes. Shape checks and the mapping to
 * AuthOptions happen downstream.
 */
export interface CloudsSource {
  /**
   * Where the document comes from, used in errors and logs.
   * Example: "/etc/openstack/clouds.yaml"
   */
  readonly location: string

  /**
   * Load the top-level mapping of the document.
   *
   * - An empty document yields `{}`
   * - Rejects with CloudsReadError when the bytes cannot be read
   * - Rejects with CloudsParseError when they cannot be decoded into a mapping
   */
  load(): Promise<Record<string, unknown>>
}
