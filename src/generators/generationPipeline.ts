import {
  ResolvedOptions, ProjectConfig, GenerationPlan, ExistingArtifact, GenerationResult, EmitMode,
} from '../types';
import { resolveGenerationPlan } from '../resolvers/optionResolver';
import { planArtifacts } from '../planners/artifactPlanner';
import { renderArtifacts } from '../templates/templateComposer';
import { EmitterFileSystem, emitArtifacts } from './emitter';
import { buildNextSteps } from './nextSteps';

export interface PipelineOptions {
  existing?: ExistingArtifact[];
  fs?: EmitterFileSystem;
}

/** Options + config → frozen plan. Validation only; nothing is read or written. */
export function resolvePlan(options: ResolvedOptions, config: ProjectConfig): GenerationPlan {
  return resolveGenerationPlan(options, config);
}

/**
 * Runs plan → descriptors → rendered artifacts → emission.
 * Every error except IOFailure is raised before the first write.
 */
export function generateFromPlan(
  plan: GenerationPlan,
  mode: EmitMode,
  options: PipelineOptions = {},
): GenerationResult {
  const descriptors = planArtifacts(plan, options.existing ?? []);
  const artifacts = renderArtifacts(plan, descriptors);
  const emit = emitArtifacts(artifacts, {
    mode,
    outputRoot: plan.outputRoot,
    entityName: plan.entity.singularName,
    fs: options.fs,
  });

  return {
    plan,
    descriptors,
    artifacts,
    emit,
    nextSteps: buildNextSteps(plan, descriptors),
  };
}

export function runGeneration(
  options: ResolvedOptions,
  config: ProjectConfig,
  pipeline: PipelineOptions = {},
): GenerationResult {
  const plan = resolvePlan(options, config);
  return generateFromPlan(plan, options.dryRun ? 'preview' : 'materialize', pipeline);
}
