/**
 * mdtouch - library exports
 */

export { preciseNow, touchFile } from './Toucher';
export { TouchCLI } from './TouchCLI';
export type { TouchCLIOptions } from './TouchCLI';
export { TouchError } from './errors';
export { bannerLines, helpMessage, DESCRIPTION, HELP_FLAGS, PROGRAM_NAME } from './messages';
export { findPackageRoot, getRuntimeConfigFromEnv, loadEnv } from './envLoader';
export type { RuntimeConfig, TouchConfig } from './envLoader';
export {
    BUILD_INFO_FILE,
    DEFAULT_BUILD_DATETIME,
    defaultBuildInfoPath,
    readBuildInfo,
    resolveBuildInfo,
    writeBuildInfo,
} from './buildInfo';
export type { BuildInfo } from './buildInfo';
export { createLogger } from './logger';
export type { Logger, LogLevel, LoggerOptions } from './logger';
export { StdoutWriter, StderrWriter, BufferWriter } from './Writer';
export type { Writer } from './Writer';
export { main } from './mdtouch';
export type { MainOptions } from './mdtouch';
