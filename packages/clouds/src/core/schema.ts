import { z } from "zod"
import type { AuthOptions } from "../ports/auth-options"

// The YAML source turns plain null spellings into null; in-memory documents
// may still carry "" for a key written without a value.
const emptyToNull = (value: unknown): unknown => (value === "" ? null : value)

const field = z.string().nullish()

export const authSectionSchema = z.preprocess(
  (value) => (value === null || value === "" ? {} : value),
  z.object({
    username: field,
    password: field,
    tenant_name: field,
    tenant_id: field,
    auth_url: field,
  }),
)

export type AuthSection = z.output<typeof authSectionSchema>

export const cloudEntrySchema = z.preprocess(
  emptyToNull,
  z
    .object({
      auth: authSectionSchema.optional(),
    })
    .nullable(),
)

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

// Checked without copying: cloud names such as `__proto__` must reach the
// caller as own keys.
export const cloudsDocumentSchema = z.object({
  clouds: z
    .preprocess(
      emptyToNull,
      z
        .custom<Record<string, unknown>>(isRecord, { error: "expected a mapping of clouds" })
        .nullable(),
    )
    .optional(),
})

export function toAuthOptions(auth: AuthSection): AuthOptions {
  return {
    identityEndpoint: auth.auth_url ?? "",
    username: auth.username ?? "",
    password: auth.password ?? "",
    tenantName: auth.tenant_name ?? "",
    tenantId: auth.tenant_id ?? "",
  }
}
