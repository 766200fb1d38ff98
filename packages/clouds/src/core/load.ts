import { BaseError } from "@cumulus/errors"
import { createNullLogger, type Logger } from "@cumulus/logger"
import { ObjectSource } from "../adapters/object/object-source"
import { YamlSource } from "../adapters/yaml/yaml-source"
import { isCloudsParseError, NoCloudsFileError } from "../errors/errors"
import type { ICloudsConfig } from "../ports/clouds-config"
import type { CloudsSource } from "../ports/clouds-source"
import { CloudsConfig } from "./clouds-config"
import { parseCloudsDocument } from "./parse-clouds"
import { defaultSearchPaths, type SearchPathOptions } from "./search-paths"

export type LoadCloudsOptions = SearchPathOptions & {
  /** Receives debug entries for each candidate tried. */
  logger?: Logger
}

export type LoadCloudsFromFileOptions = {
  /**
   * Base directory for a relative `file`.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export async function loadCloudsFromSource(source: CloudsSource): Promise<ICloudsConfig> {
  const document = await source.load()

  return new CloudsConfig(parseCloudsDocument(document, source.location))
}

/**
 * Loads clouds from one clouds.yaml file.
 *
 * Rejects with CloudsReadError when the file cannot be read and with
 * CloudsParseError when it is malformed or defines no clouds.
 */
export async function loadCloudsFromFile(
  file: string,
  options: LoadCloudsFromFileOptions = {},
): Promise<ICloudsConfig> {
  return loadCloudsFromSource(new YamlSource({ file, cwd: options.cwd }))
}

/**
 * Loads clouds from an in-memory document with the clouds.yaml layout.
 */
export async function loadCloudsFromObject(
  document: Record<string, unknown>,
  location?: string,
): Promise<ICloudsConfig> {
  return loadCloudsFromSource(new ObjectSource(document, location))
}

/**
 * Loads the first usable clouds.yaml on the search path
 * (see {@link defaultSearchPaths}).
 *
 * A candidate that cannot be read is skipped. A candidate that is found but
 * malformed ends the search with its CloudsParseError. When no candidate
 * loads, rejects with NoCloudsFileError.
 */
export async function loadClouds(options: LoadCloudsOptions = {}): Promise<ICloudsConfig> {
  const logger = (options.logger ?? createNullLogger()).child({ module: "clouds" })
  const candidates = defaultSearchPaths(options)

  for (const file of candidates) {
    logger.debug("reading clouds.yaml candidate", { file })

    try {
      const config = await loadCloudsFromFile(file)

      logger.debug("loaded clouds.yaml", { file, count: config.names().length })

      return config
    } catch (err) {
      if (isCloudsParseError(err)) throw err

      logger.debug("skipped clouds.yaml candidate", {
        file,
        err,
        ...(err instanceof BaseError ? { code: err.code } : {}),
      })
    }
  }

  throw NoCloudsFileError.searched(candidates)
}
