#!/usr/bin/env node
import { extendCommand, runCli } from '@/bin/run';
import { extensionsFromConfig, loadExtensionConfig } from '@/core/config';
import {
  author,
  defaultValues,
  envVars,
  helpSubCommand,
  longDescription,
  requireFlags,
  versionSubCommand,
} from '@/extensions';
import type { Command, Extension, ParsedArguments } from '@/types';

function flagValue(args: ParsedArguments, longName: string): string | undefined {
  return args.flags.find((parsed) => parsed.flag.longName === longName)?.value;
}

const deploy: Command = extendCommand(
  {
    name: 'deploy',
    description: 'Deploy a build to an environment',
    flags: [
      { longName: 'target', shortName: 't', argument: '<env>', description: 'Target environment' },
      { longName: 'token', argument: '<token>', description: 'API token', envVar: 'DEMO_TOKEN' },
      { longName: 'dry-run', description: 'Print the plan without deploying' },
    ],
    subCommands: [],
    run: (args) => {
      const dryRun = flagValue(args, 'dry-run') === 'true';
      console.log(`${dryRun ? 'Would deploy' : 'Deploying'} to ${flagValue(args, 'target')}`);
      for (const parsed of args.flags) {
        console.log(`  --${parsed.flag.longName} (${parsed.source})`);
      }
      return 0;
    },
  },
  [envVars(), defaultValues([['target', 'staging']]), requireFlags(['token']), helpSubCommand()],
);

const root: Command = {
  name: 'cli-extensions-demo',
  description: 'Sample command tree built with cli-extensions',
  flags: [{ longName: 'verbose', shortName: 'v', description: 'Verbose output' }],
  subCommands: [deploy],
  version: '0.1.0',
  run: (_args, context) => {
    console.log(`Run '${context.path.join(' ')} help' for available commands.`);
    return 0;
  },
};

const defaultExtensions: Extension[] = [
  author('The cli-extensions authors'),
  longDescription('Demonstrates every builtin extension.\nTry `deploy --help`.'),
  versionSubCommand(),
  helpSubCommand(),
];

const config = loadExtensionConfig();
const extensions = config ? extensionsFromConfig(config) : defaultExtensions;

process.exit(runCli(extendCommand(root, extensions), process.argv.slice(2)));
