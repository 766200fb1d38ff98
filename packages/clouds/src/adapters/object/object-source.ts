import type { CloudsSource } from "../../ports/clouds-source"

/**
 * Serves an already-decoded clouds document, e.g. one assembled by the host
 * application. Scalars must be strings, as the YAML source produces them.
 */
export class ObjectSource implements CloudsSource {
  constructor(
    private readonly document: Record<string, unknown>,
    readonly location: string = "object",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return structuredClone(this.document)
  }
}
