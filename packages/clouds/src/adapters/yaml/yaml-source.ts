import fs from "node:fs/promises"
import path from "node:path"
import { parseDocument, Scalar, visit } from "yaml"
import { CloudsParseError, CloudsReadError } from "../../errors/errors"
import type { CloudsSource } from "../../ports/clouds-source"

/**
 * Options for creating a YAML clouds source.
 */
export type YamlSourceOptions = {
  /**
   * Path to the clouds.yaml file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "clouds.yaml", "/etc/openstack/clouds.yaml"
   */
  file: string

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

// YAML 1.2 core-schema spellings of null. Quoted scalars never match.
const NULL_SCALAR = /^(?:~|null|Null|NULL|)$/

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

export class YamlSource implements CloudsSource {
  readonly location: string

  constructor(opts: YamlSourceOptions) {
    this.location = path.resolve(opts.cwd ?? process.cwd(), opts.file)
  }

  async load(): Promise<Record<string, unknown>> {
    let content: string

    try {
      content = await fs.readFile(this.location, "utf-8")
    } catch (err) {
      throw CloudsReadError.fromCause(this.location, err)
    }

    // failsafe keeps scalars as written: `tenant_id: 0042` stays "0042"
    const doc = parseDocument(content, { schema: "failsafe", logLevel: "error" })
    const [error] = doc.errors

    if (error) throw new CloudsParseError(this.location, error)

    visit(doc, {
      Scalar(key, node) {
        if (key === "key" || node.type !== Scalar.PLAIN) return
        if (typeof node.value === "string" && NULL_SCALAR.test(node.value)) node.value = null
      },
    })

    const document: unknown = doc.toJS()

    if (document === null || document === undefined) return {}

    if (!isRecord(document)) {
      throw new CloudsParseError(this.location, new Error("document root is not a mapping"))
    }

    return document
  }
}
