import { BaseError } from "@cumulus/errors"

export type CloudsErrorCode =
  | "clouds_read_failed"
  | "clouds_parse_failed"
  | "cloud_not_found"
  | "clouds_file_not_found"
  | "home_directory_unavailable"

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * A clouds.yaml candidate could not be read: missing, a directory,
 * or not readable. The search moves on to the next candidate.
 */
export class CloudsReadError extends BaseError<"clouds_read_failed"> {
  static fromCause(file: string, cause: unknown): CloudsReadError {
    return new CloudsReadError(`clouds: ${causeMessage(cause)}`, {
      code: "clouds_read_failed",
      context: { file },
      cause,
    })
  }
}

/**
 * A clouds.yaml file was found but is malformed or defines no clouds.
 * Stops the search.
 */
export class CloudsParseError extends BaseError<"clouds_parse_failed"> {
  constructor(
    readonly file: string,
    cause?: unknown,
  ) {
    super(
      cause === undefined
        ? `clouds: cannot parse ${file}`
        : `clouds: cannot parse ${file}: ${causeMessage(cause)}`,
      { code: "clouds_parse_failed", context: { file }, cause },
    )
  }
}

export class CloudNotFoundError extends BaseError<"cloud_not_found"> {
  static forCloud(cloud: string): CloudNotFoundError {
    return new CloudNotFoundError(`clouds: cloud \`${cloud}\` not found`, {
      code: "cloud_not_found",
      context: { cloud },
    })
  }
}

export class NoCloudsFileError extends BaseError<"clouds_file_not_found"> {
  static searched(files: readonly string[]): NoCloudsFileError {
    return new NoCloudsFileError("clouds: no usable clouds.yaml file found", {
      code: "clouds_file_not_found",
      context: { searched: [...files] },
    })
  }
}

export class HomeDirectoryError extends BaseError<"home_directory_unavailable"> {
  static lookupFailed(cause: unknown): HomeDirectoryError {
    return new HomeDirectoryError(
      `clouds: cannot find home directory: ${causeMessage(cause)}`,
      { code: "home_directory_unavailable", cause },
    )
  }

  static notSet(): HomeDirectoryError {
    return new HomeDirectoryError("clouds: home directory is not set", {
      code: "home_directory_unavailable",
    })
  }
}

export function isCloudsParseError(err: unknown): err is CloudsParseError {
  return err instanceof CloudsParseError
}
