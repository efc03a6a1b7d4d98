import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as z from 'zod';
import {
  author,
  defaultValues,
  envVars,
  helpSubCommand,
  longDescription,
  requireFlags,
  versionSubCommand,
} from '@/extensions';
import type { Extension, ExtensionConfig } from '@/types';

export const CONFIG_FILE_NAME = '.cli-extensions.json';

const FLAG_NAME = z.string().regex(/^[a-zA-Z0-9][a-zA-Z0-9-]*$/);

const ExtensionConfigSchema = z.strictObject({
  version: z.literal(1),
  author: z.string().min(1).optional(),
  longDescription: z.string().min(1).optional(),
  help: z.boolean().optional(),
  versionCommand: z.boolean().optional(),
  defaults: z.record(FLAG_NAME, z.string()).optional(),
  required: z.array(FLAG_NAME).optional(),
  envVars: z.boolean().optional(),
});

export function getConfigPath(cwd?: string): string {
  return join(cwd ?? process.cwd(), CONFIG_FILE_NAME);
}

/**
 * Load the extension config from `cwd`.
 * Returns null when the file is missing, empty or invalid.
 */
export function loadExtensionConfig(cwd?: string): ExtensionConfig | null {
  const path = getConfigPath(cwd);
  if (!existsSync(path)) {
    return null;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    if (!content.trim()) {
      return null;
    }
    const result = ExtensionConfigSchema.safeParse(JSON.parse(content));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

/** @internal Exported for testing */
export function validateExtensionConfig(config: unknown): string[] {
  const result = ExtensionConfigSchema.safeParse(config);
  if (result.success) {
    return [];
  }
  return result.error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return `${path || '(root)'}: ${issue.message}`;
  });
}

/**
 * Build the extension list a config describes. A flag's value comes from the
 * user, then the environment, then its default; all three are in place before
 * the required-flag check. The help subcommand has its own priority.
 */
export function extensionsFromConfig(config: ExtensionConfig): Extension[] {
  const extensions: Extension[] = [];
  if (config.author) {
    extensions.push(author(config.author));
  }
  if (config.longDescription) {
    extensions.push(longDescription(config.longDescription));
  }
  if (config.envVars) {
    extensions.push(envVars());
  }
  if (config.defaults) {
    extensions.push(defaultValues(Object.entries(config.defaults)));
  }
  if (config.required && config.required.length > 0) {
    extensions.push(requireFlags(config.required));
  }
  if (config.versionCommand) {
    extensions.push(versionSubCommand());
  }
  if (config.help) {
    extensions.push(helpSubCommand());
  }
  return extensions;
}
