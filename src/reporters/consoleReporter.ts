import chalk from 'chalk';
import ora, { Ora } from 'ora';
import {
  GenerationPlan, PreviewTree, ManifestEntry, WriteStatus, ArtifactCategory,
} from '../types';
import { LayergenError, IOFailureError, InvalidConfigurationError, errorMessage } from '../shared/errors';

export function showHeader(): void {
  console.log('');
  console.log(chalk.bold.cyan('  layergen') + chalk.gray(' · clean architecture scaffolding for entities'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

export function showPlan(plan: GenerationPlan): void {
  const { entity, flags } = plan;
  const on = (value: boolean) => (value ? chalk.green('on') : chalk.gray('off'));

  console.log(`  Entity:      ${chalk.white(entity.singularName)} ${chalk.gray(`(plural ${entity.pluralName})`)}`);
  console.log(`  Operations:  ${chalk.white(plan.operations.join(', '))}`);
  console.log(`  Tier:        ${chalk.white(plan.entityTier)}`);
  console.log(`  Template:    ${chalk.white(plan.templateId)}`);
  console.log(`  Output:      ${chalk.white(plan.outputRoot)}`);
  console.log(`  Tests ${on(flags.generateTests)}  Permissions ${on(flags.generatePermissions)}  Events ${on(flags.generateEvents)}  Mapping ${on(flags.generateMappingProfiles)}`);
  console.log('');
}

const CATEGORY_LABELS: Record<ArtifactCategory, string> = {
  Model: 'Domain model',
  WriteOperation: 'Commands',
  ReadOperation: 'Queries',
  Mapping: 'Mappings',
  Endpoint: 'Endpoints',
  AccessControl: 'Permissions',
  Test: 'Tests',
};

export function showPreviewTree(tree: PreviewTree): void {
  console.log(chalk.bold(`  ${tree.entityName}`) + chalk.gray(` → ${tree.outputRoot}`));
  tree.groups.forEach((group, gi) => {
    const lastGroup = gi === tree.groups.length - 1;
    console.log(`  ${lastGroup ? '└─' : '├─'} ${chalk.cyan(CATEGORY_LABELS[group.category])} ${chalk.gray(`(${group.artifacts.length})`)}`);
    group.artifacts.forEach((node, ni) => {
      const branch = ni === group.artifacts.length - 1 ? '└─' : '├─';
      console.log(`  ${lastGroup ? '   ' : '│  '}${branch} ${chalk.white(node.relativePath)} ${chalk.gray(`${node.bytes} B`)}`);
    });
  });
  console.log('');
}

const STATUS_MARKS: Record<WriteStatus, string> = {
  planned: chalk.blue('i'),
  written: chalk.green('✓'),
  failed: chalk.red('✗'),
  'not-attempted': chalk.gray('-'),
};

export function showManifest(manifest: ManifestEntry[], verbose: boolean): void {
  const entries = verbose ? manifest : manifest.filter(e => e.writeStatus !== 'not-attempted');
  for (const entry of entries) {
    const suffix = entry.error ? chalk.red(` (${entry.error})`) : '';
    console.log(`    ${STATUS_MARKS[entry.writeStatus]} ${chalk.white(entry.relativePath)}${suffix}`);
  }

  const skipped = manifest.length - entries.length;
  if (skipped > 0) {
    console.log(`    ${chalk.gray(`... ${skipped} not attempted`)}`);
  }
  console.log('');
}

export function showNextSteps(steps: string[]): void {
  if (steps.length === 0) return;
  console.log(chalk.yellow('  Manual steps required:'));
  steps.forEach((step, i) => {
    console.log(`  ${i + 1}. ${step}`);
  });
  console.log('');
}

export function showError(error: unknown): void {
  if (error instanceof LayergenError) {
    console.error(`\n  ${chalk.red('Error')} ${chalk.gray(`[${error.code}]`)} ${error.message}`);
    if (error instanceof InvalidConfigurationError) {
      console.error(chalk.gray('  Run `layergen config sample` to see a valid configuration.'));
    }
    if (error instanceof IOFailureError) {
      console.error('');
      showManifest(error.manifest, true);
    }
    return;
  }
  console.error(`\n  ${chalk.red('Error')} ${errorMessage(error)}`);
}

export function createSpinner(text: string): Ora {
  return ora({
    text,
    indent: 2,
  });
}
