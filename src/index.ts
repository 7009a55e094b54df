#!/usr/bin/env node
import { Command } from 'commander';
import { generate } from './commands/generate.js';
import { DEFAULT_PATTERN } from './utils/detect.js';

const VERSION = '0.3.0';

const program = new Command();

program
  .name('kamut')
  .description('Render *.kamut.yaml files into Kubernetes manifests')
  .version(VERSION);

// Default command: generate
program
  .command('generate', { isDefault: true })
  .description('Generate manifests for every kamut file matching a pattern')
  .argument('[pattern]', `Glob of kamut files (default: ${DEFAULT_PATTERN})`)
  .option('-n, --name <name>', 'Only process <name>.kamut.yaml')
  .option('-c, --config <path>', 'Path to settings file (default: ./kamut.config.yaml)')
  .option('--infer-kind', 'Infer a missing kind from the fields a document sets')
  .option('--dry-run', 'Render and report without writing output files')
  .action(generate);

program
  .command('version')
  .description('Print the kamut version')
  .action(() => {
    console.log(VERSION);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
