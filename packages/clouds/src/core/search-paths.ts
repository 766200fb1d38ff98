import os from "node:os"
import path from "node:path"
import { HomeDirectoryError } from "../errors/errors"

export const CLOUDS_FILE_NAME = "clouds.yaml"

export const SYSTEM_CONFIG_DIR = "/etc/openstack"

export type SearchPathOptions = {
  /**
   * Directory searched first.
   *
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Returns the current user's home directory.
   *
   * @default the home directory of the OS user record
   */
  homedir?: () => string

  /**
   * Directory searched last.
   *
   * @default "/etc/openstack"
   */
  systemDir?: string
}

function currentUserHome(): string {
  return os.userInfo().homedir
}

function resolveHomeDir(lookup: () => string): string {
  let home: string

  try {
    home = lookup()
  } catch (err) {
    throw HomeDirectoryError.lookupFailed(err)
  }

  if (!home) throw HomeDirectoryError.notSet()

  return home
}

/**
 * Candidate clouds.yaml paths, in search order:
 *
 * 1. `<cwd>/clouds.yaml`
 * 2. `<home>/.config/openstack/clouds.yaml`
 * 3. `/etc/openstack/clouds.yaml`
 *
 * Throws HomeDirectoryError when the home directory cannot be determined.
 */
export function defaultSearchPaths(options: SearchPathOptions = {}): string[] {
  const home = resolveHomeDir(options.homedir ?? currentUserHome)

  return [
    path.resolve(options.cwd ?? process.cwd(), CLOUDS_FILE_NAME),
    path.join(home, ".config", "openstack", CLOUDS_FILE_NAME),
    path.join(options.systemDir ?? SYSTEM_CONFIG_DIR, CLOUDS_FILE_NAME),
  ]
}
