import * as path from 'path';
import { AddCommandOptions, GenerationResult } from '../types';
import { loadProjectConfig } from '../config/projectConfig';
import { resolvePlan, generateFromPlan } from '../generators/generationPipeline';
import { probeExistingModel } from './existingModel';
import { promptRegenerateModel } from '../prompts/regeneratePrompt';
import {
  showHeader, showPlan, showPreviewTree, showManifest, showNextSteps, createSpinner,
} from '../reporters/consoleReporter';

export async function runAdd(options: AddCommandOptions): Promise<GenerationResult> {
  showHeader();

  const cwd = process.cwd();
  const { config, configPath } = loadProjectConfig(cwd, options.configPath);
  if (options.verbose) {
    console.log(`  Config: ${configPath ? path.relative(cwd, configPath) || configPath : 'defaults'}\n`);
  }

  let plan = resolvePlan(options, config);
  if (options.verbose) showPlan(plan);

  // 1. Look for an existing model before anything is planned
  const existing = probeExistingModel(plan);
  const modelOnDisk = existing.find(e => e.entityTier === plan.entityTier);
  if (modelOnDisk && !plan.regenerateModel && options.interactive && !options.dryRun) {
    if (await promptRegenerateModel(modelOnDisk.relativePath)) {
      plan = resolvePlan({ ...options, regenerateModel: true }, config);
    }
  }

  // 2. Plan, render, emit
  const mode = options.dryRun ? 'preview' : 'materialize';
  const spinner = createSpinner(`Generating ${plan.entity.singularName}...`);
  spinner.start();
  let result: GenerationResult;
  try {
    result = generateFromPlan(plan, mode, { existing });
  } catch (error: unknown) {
    spinner.fail(`Generation failed for ${plan.entity.singularName}`);
    throw error;
  }

  const count = result.artifacts.length;
  if (mode === 'preview') {
    spinner.info(`--dry-run: ${count} files would be generated`);
    showPreviewTree(result.emit.tree);
  } else {
    spinner.succeed(`Generated ${count} files for ${plan.entity.singularName}`);
    showManifest(result.emit.manifest, options.verbose);
  }

  showNextSteps(result.nextSteps);
  return result;
}
