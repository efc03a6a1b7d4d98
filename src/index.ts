export { formatFlag, printHelp, printVersion, renderHelp } from './bin/help';
export { parseArguments, selectCommand } from './bin/parse';
export { type ExtendOptions, extendCommand, runCli } from './bin/run';
export {
  CONFIG_FILE_NAME,
  extensionsFromConfig,
  getConfigPath,
  loadExtensionConfig,
} from './core/config';
export { envFrom, processEnv } from './core/env';
export { abortOnConfigurationError, ConfigurationError } from './core/errors';
export {
  applyPostprocess,
  applyStructural,
  DEFAULT_PRIORITY,
  defineExtension,
  type ExtensionDefinition,
  orderExtensions,
  tryApplyStructural,
} from './core/pipeline';
export { diffBy, findFlag, mapFlag, parsedFlagKey, unionLeftBy } from './core/reconcile';
export { appendSelfReferentialChild } from './core/self-reference';
export * from './extensions';
export type * from './types';
