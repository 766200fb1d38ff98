export { ObjectSource } from "./adapters/object/object-source"
export { YamlSource, type YamlSourceOptions } from "./adapters/yaml/yaml-source"
export { CloudsConfig } from "./core/clouds-config"
export {
  type LoadCloudsFromFileOptions,
  type LoadCloudsOptions,
  loadClouds,
  loadCloudsFromFile,
  loadCloudsFromObject,
  loadCloudsFromSource,
} from "./core/load"
export { parseCloudsDocument } from "./core/parse-clouds"
export {
  CLOUDS_FILE_NAME,
  defaultSearchPaths,
  SYSTEM_CONFIG_DIR,
  type SearchPathOptions,
} from "./core/search-paths"
export {
  CloudNotFoundError,
  CloudsParseError,
  CloudsReadError,
  type CloudsErrorCode,
  HomeDirectoryError,
  isCloudsParseError,
  NoCloudsFileError,
} from "./errors/errors"
export type { AuthOptions } from "./ports/auth-options"
export type { ICloudsConfig } from "./ports/clouds-config"
export type { CloudsSource } from "./ports/clouds-source"
