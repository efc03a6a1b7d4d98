export { author } from './author';
export { defaultValues } from './default-values';
export { envVars } from './env-vars';
export { HELP_PRIORITY, helpSubCommand } from './help-subcommand';
export { longDescription, renderDescriptionSection } from './long-description';
export { requireFlags } from './require-flags';
export { versionSubCommand } from './version-subcommand';
