import {
  ArtifactCategory, ArtifactDescriptor, DescriptorKind, GenerationPlan, ProjectConfig, ResolvedOptions,
} from '../../src/types';
import { parseProjectConfig, RawProjectConfig } from '../../src/config/projectConfig';
import { resolveGenerationPlan } from '../../src/resolvers/optionResolver';

export const WORK_DIR = '/work';

export function testConfig(raw: RawProjectConfig = {}, baseDir = WORK_DIR): ProjectConfig {
  return parseProjectConfig(raw, baseDir, 'layergen.json');
}

/** order, Create + Read, Audited, tests and permissions on, events and mapping off. */
export const SCENARIO_A_CONFIG: RawProjectConfig = {
  codeGeneration: {
    defaultEntityType: 'Audited',
    generateEvents: false,
    generateMappingProfiles: false,
    generatePermissions: true,
    generateTests: true,
  },
};

export function scenarioAPlan(overrides: Partial<ResolvedOptions> = {}): GenerationPlan {
  return planFor({ entityName: 'order', create: true, read: true, ...overrides }, SCENARIO_A_CONFIG);
}

export function planFor(options: ResolvedOptions, raw: RawProjectConfig = {}): GenerationPlan {
  return resolveGenerationPlan(options, testConfig(raw));
}

export function descriptor(
  logicalName: string,
  dependsOn: string[] = [],
  overrides: Partial<ArtifactDescriptor> = {},
): ArtifactDescriptor {
  const kind: DescriptorKind = overrides.kind ?? 'model';
  const category: ArtifactCategory = overrides.category ?? 'Model';
  return {
    category,
    kind,
    relativePath: `out/${logicalName}.cs`,
    logicalName,
    dependsOn,
    intent: `${kind}:${logicalName}`,
    ...overrides,
  };
}

export function countKinds(descriptors: ArtifactDescriptor[]): Partial<Record<DescriptorKind, number>> {
  const counts: Partial<Record<DescriptorKind, number>> = {};
  for (const d of descriptors) {
    counts[d.kind] = (counts[d.kind] ?? 0) + 1;
  }
  return counts;
}
