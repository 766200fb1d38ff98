import { z } from "zod"
import { CloudsParseError } from "../errors/errors"
import type { AuthOptions } from "../ports/auth-options"
import { cloudEntrySchema, cloudsDocumentSchema, toAuthOptions } from "./schema"

/**
 * Maps a decoded clouds.yaml document to AuthOptions by cloud name.
 *
 * Clouds without an `auth` section are left out. A missing, null or empty
 * `clouds` mapping fails the same way as a malformed one: with a
 * CloudsParseError naming `location`.
 */
export function parseCloudsDocument(
  document: Record<string, unknown>,
  location: string,
): Map<string, AuthOptions> {
  const result = cloudsDocumentSchema.safeParse(document)

  if (!result.success) throw schemaError(location, result.error)

  const clouds = result.data.clouds

  if (!clouds || Object.keys(clouds).length === 0) {
    throw new CloudsParseError(location, new Error("config is empty"))
  }

  const parsed = new Map<string, AuthOptions>()

  for (const [name, value] of Object.entries(clouds)) {
    const entry = cloudEntrySchema.safeParse(value)

    if (!entry.success) throw schemaError(location, entry.error, ["clouds", name])

    if (entry.data?.auth) {
      parsed.set(name, toAuthOptions(entry.data.auth))
    }
  }

  return parsed
}

function schemaError(
  location: string,
  error: z.ZodError,
  prefix: PropertyKey[] = [],
): CloudsParseError {
  const rooted = new z.ZodError(
    error.issues.map((issue) => ({ ...issue, path: [...prefix, ...issue.path] })),
  )

  return new CloudsParseError(location, new Error(z.prettifyError(rooted), { cause: error }))
}
