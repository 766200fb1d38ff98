/**
 * Credentials for one cloud, in the shape an OpenStack identity client takes.
 *
 * Fields missing from clouds.yaml are empty strings; nothing here is checked
 * for presence or format.
 */
export type AuthOptions = {
  /** Identity service URL, from `auth_url`. */
  identityEndpoint: string
  username: string
  password: string
  tenantName: string
  tenantId: string
}
