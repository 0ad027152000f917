/**
 * @keyhop/core
 *
 * Route resolution and live configuration for keyhop: the route model,
 * config loading, the snapshot store, the resolver and the program executor.
 */

// Route model
export {
  classifyRoutePath,
  createRoute,
  createRouteGroup,
  describeRoute,
  type Route,
  type RouteGroup,
  type RouteInit,
  type RouteKind,
} from "./route.js";

// Config loading
export {
  parseConfig,
  readConfig,
  configDocumentSchema,
  routeGroupSchema,
  routeObjectSchema,
  routeSchema,
  LARGE_FILE_SIZE_THRESHOLD,
  type Config,
  type ConfigDocument,
  type ParseConfigOptions,
  type ReadConfigOptions,
} from "./config.js";
export {
  findConfigPath,
  loadCustomPathConfig,
  defaultConfigLocations,
  readDefaultConfig,
  CONFIG_FILENAME,
} from "./config-location.js";

// Index, snapshot and resolution
export { buildRouteIndex, type RouteIndex } from "./route-index.js";
export { createSnapshot, SnapshotStore, type Snapshot } from "./snapshot.js";
export { resolveHop, checkRoute, tokenizeQuery, type HopResolution } from "./resolver.js";

// Execution and templates
export { executeRoute, parseProgramOutput, type HopAction, type ExecuteOptions } from "./executor.js";
export { renderTemplate, encodeQueryArgs } from "./template.js";

// Reloading
export { ConfigReloader, type ConfigReloaderOptions } from "./reload.js";
export { ConfigWatcher, type ConfigWatcherOptions } from "./watcher.js";

// Errors and logging
export {
  KeyhopError,
  IoError,
  ConfigParseError,
  ConfigTooLargeError,
  ConfigEmptyError,
  ProgramOutputError,
  CustomProgramError,
  InvalidConfigPathError,
  NoValidConfigPathError,
  InvalidRouteError,
  isKeyhopError,
  type KeyhopErrorCode,
} from "./errors.js";
export {
  makeLogger,
  makeNoopLogger,
  logLevelFromFlags,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
