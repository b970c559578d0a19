import * as fs from 'fs';
import * as path from 'path';
import { EntityTier, ExistingArtifact, GenerationPlan } from '../types';
import { modelRelativePath } from '../planners/artifactPlanner';

const BASE_CLASS = /class\s+\w+\s*:\s*(FullyAuditedEntity|AuditedEntity|Entity)\s*<\s*Guid\s*>/;

const TIER_BY_BASE: Record<string, EntityTier> = {
  Entity: 'Basic',
  AuditedEntity: 'Audited',
  FullyAuditedEntity: 'FullyAudited',
};

/** Tier implied by a model file's base class, or undefined when unrecognized. */
export function detectModelTier(source: string): EntityTier | undefined {
  const match = BASE_CLASS.exec(source);
  return match ? TIER_BY_BASE[match[1]] : undefined;
}

/**
 * Looks at the planned model path only. Returns the snapshot the planner
 * checks for conflicts; empty when no model exists yet.
 */
export function probeExistingModel(plan: GenerationPlan): ExistingArtifact[] {
  const relativePath = modelRelativePath(plan);
  const fullPath = path.join(plan.outputRoot, relativePath);
  if (!fs.existsSync(fullPath)) return [];

  const source = fs.readFileSync(fullPath, 'utf-8');
  return [{ relativePath, kind: 'model', entityTier: detectModelTier(source) }];
}
