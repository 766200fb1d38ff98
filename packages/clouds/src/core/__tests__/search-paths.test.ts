import os from "node:os"
import path from "node:path"
import { HomeDirectoryError } from "../../errors/errors"
import { defaultSearchPaths } from "../search-paths"

describe("defaultSearchPaths", () => {
  it("lists cwd, user config and system config in order", () => {
    const paths = defaultSearchPaths({ cwd: "/work/project", homedir: () => "/home/demo" })

    expect(paths).toEqual([
      "/work/project/clouds.yaml",
      "/home/demo/.config/openstack/clouds.yaml",
      "/etc/openstack/clouds.yaml",
    ])
  })

  it("honours a custom system directory", () => {
    const paths = defaultSearchPaths({
      cwd: "/work",
      homedir: () => "/home/demo",
      systemDir: "/opt/openstack",
    })

    expect(paths[2]).toBe("/opt/openstack/clouds.yaml")
  })

  it("defaults to the process cwd and the OS user's home", () => {
    const paths = defaultSearchPaths()

    expect(paths).toEqual([
      path.resolve(process.cwd(), "clouds.yaml"),
      path.join(os.userInfo().homedir, ".config", "openstack", "clouds.yaml"),
      "/etc/openstack/clouds.yaml",
    ])
  })

  it("wraps a failed home directory lookup", () => {
    const lookup = () => {
      throw new Error("no passwd entry")
    }

    expect(() => defaultSearchPaths({ homedir: lookup })).toThrow(HomeDirectoryError)
    expect(() => defaultSearchPaths({ homedir: lookup })).toThrow(
      "clouds: cannot find home directory: no passwd entry",
    )
  })

  it("rejects an empty home directory", () => {
    expect(() => defaultSearchPaths({ homedir: () => "" })).toThrow(
      "clouds: home directory is not set",
    )
  })
})
