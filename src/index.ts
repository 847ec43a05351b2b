/**
 * @fileoverview Public entry point: the BBC-X core and the build driver.
 */

export * from './bbcx';
export { buildAll, buildFile } from './toolchain/build';
export type { BuildEnvironment } from './toolchain/build';
export { parseCommandLine } from './toolchain/cli-args';
export type { CliCommand } from './toolchain/cli-args';
export {
  findConfigFile,
  loadConfigFile,
  mergeConfig,
  populateFromConfig,
  resolveBuildOptions,
} from './toolchain/config-loader';
export { validateBuildConfig } from './toolchain/config-validation';
export type { ValidationResult } from './toolchain/config-validation';
export { formatListing, formatTimestamp } from './toolchain/list-writer';
export { TraceWriter, dumpMemory, formatCell, formatStep } from './toolchain/trace-writer';
export * from './toolchain/types';
