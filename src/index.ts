#!/usr/bin/env node
import { Command } from 'commander';
import { runAdd } from './commands/add';
import { runConfigInit, runConfigSample } from './commands/config';
import { showError } from './reporters/consoleReporter';

interface AddCliOptions {
  all?: boolean;
  create?: boolean;
  read?: boolean;
  update?: boolean;
  delete?: boolean;
  entityType?: string;
  tests: boolean;
  permissions: boolean;
  events?: boolean;
  mappingProfiles?: boolean;
  template?: string;
  output?: string;
  dryRun: boolean;
  regenerateModel: boolean;
  interactive: boolean;
  verbose: boolean;
  config?: string;
}

function fail(error: unknown): never {
  showError(error);
  process.exit(1);
}

const program = new Command();

program
  .name('layergen')
  .description('Generates Clean Architecture CRUD artifacts for a C# entity')
  .version('0.1.0', '-v, --version');

program
  .command('add')
  .alias('generate')
  .description('Generate model, commands, queries, endpoint, permissions and tests for an entity')
  .argument('<entity>', 'Entity name, singular or plural (e.g. Order, Orders)')
  .option('-a, --all', 'Generate every operation')
  .option('-c, --create', 'Generate the create operation')
  .option('-r, --read', 'Generate the list and by-id queries')
  .option('-u, --update', 'Generate the update operation')
  .option('-d, --delete', 'Generate the delete operation')
  .option('-e, --entity-type <type>', 'Entity tier: Basic, Audited, FullyAudited')
  .option('--no-tests', 'Skip test generation')
  .option('--no-permissions', 'Skip permission constants and attributes')
  .option('--events', 'Generate domain events (overrides config)')
  .option('--no-events', 'Skip domain events (overrides config)')
  .option('--mapping-profiles', 'Generate Mapster mapping profiles (overrides config)')
  .option('--no-mapping-profiles', 'Skip Mapster mapping profiles (overrides config)')
  .option('-t, --template <template>', 'Template set: default, minimal')
  .option('-o, --output <path>', 'Output root (defaults to the configured rootPath)')
  .option('--dry-run', 'Show what would be generated without writing files', false)
  .option('--regenerate-model', 'Overwrite an existing model file', false)
  .option('--no-interactive', 'Skip interactive prompts')
  .option('-V, --verbose', 'Show the resolved plan and every manifest entry', false)
  .option('--config <path>', 'Path to layergen.json')
  .action(async (entity: string, options: AddCliOptions) => {
    try {
      await runAdd({
        entityName: entity,
        all: options.all,
        create: options.create,
        read: options.read,
        update: options.update,
        delete: options.delete,
        entityType: options.entityType,
        skipTests: !options.tests,
        skipPermissions: !options.permissions,
        events: options.events,
        mappingProfiles: options.mappingProfiles,
        template: options.template,
        outputPath: options.output,
        dryRun: options.dryRun,
        regenerateModel: options.regenerateModel,
        configPath: options.config,
        interactive: options.interactive !== false,
        verbose: options.verbose,
      });
    } catch (error: unknown) {
      fail(error);
    }
  });

const config = program
  .command('config')
  .description('Inspect or create layergen.json');

config
  .command('sample')
  .description('Print a sample configuration')
  .action(() => {
    runConfigSample();
  });

config
  .command('init')
  .description('Write layergen.json into the current directory')
  .option('--force', 'Overwrite an existing file', false)
  .action((options: { force: boolean }) => {
    try {
      runConfigInit(process.cwd(), options.force);
    } catch (error: unknown) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
