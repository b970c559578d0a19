// === Entity ===

export interface EntitySpec {
  rawName: string;
  singularName: string;
  pluralName: string;
  camelName: string;
}

// === Operations & Tiers ===

export type Operation = 'Create' | 'Read' | 'Update' | 'Delete';

/** Canonical order; every operation list in a plan follows it. */
export const OPERATIONS: readonly Operation[] = ['Create', 'Read', 'Update', 'Delete'];

export type WriteOperation = Exclude<Operation, 'Read'>;

export const WRITE_OPERATIONS: readonly WriteOperation[] = ['Create', 'Update', 'Delete'];

export type EntityTier = 'Basic' | 'Audited' | 'FullyAudited';

export const ENTITY_TIERS: readonly EntityTier[] = ['Basic', 'Audited', 'FullyAudited'];

export type TierCapability =
  | 'identity'
  | 'name'
  | 'creation-audit'
  | 'modification-audit'
  | 'soft-delete'
  | 'deletion-audit';

/** Each tier is a strict superset of the one before it. */
export const TIER_CAPABILITIES: Record<EntityTier, readonly TierCapability[]> = {
  Basic: ['identity', 'name'],
  Audited: ['identity', 'name', 'creation-audit', 'modification-audit'],
  FullyAudited: ['identity', 'name', 'creation-audit', 'modification-audit', 'soft-delete', 'deletion-audit'],
};

export function tierHas(tier: EntityTier, capability: TierCapability): boolean {
  return TIER_CAPABILITIES[tier].includes(capability);
}

export type TemplateId = 'default' | 'minimal';

export const TEMPLATE_IDS: readonly TemplateId[] = ['default', 'minimal'];

// === Generation Plan ===

export interface GenerationFlags {
  generateTests: boolean;
  generatePermissions: boolean;
  generateEvents: boolean;
  generateMappingProfiles: boolean;
}

/** Layer roots, relative to the output root. */
export interface LayerLayout {
  modelRoot: string;
  operationRoot: string;
  persistenceRoot: string;
  endpointRoot: string;
  testsRoot: string;
}

export interface GenerationPlan {
  readonly entity: Readonly<EntitySpec>;
  readonly operations: readonly Operation[];
  readonly entityTier: EntityTier;
  readonly flags: Readonly<GenerationFlags>;
  readonly templateId: TemplateId;
  readonly outputRoot: string;
  readonly layout: Readonly<LayerLayout>;
  readonly regenerateModel: boolean;
}

// === Invocation Input ===

export interface ResolvedOptions {
  entityName: string;
  all?: boolean;
  create?: boolean;
  read?: boolean;
  update?: boolean;
  delete?: boolean;
  entityType?: string;
  skipTests?: boolean;
  skipPermissions?: boolean;
  /** Overrides codeGeneration.generateEvents when set. */
  events?: boolean;
  /** Overrides codeGeneration.generateMappingProfiles when set. */
  mappingProfiles?: boolean;
  template?: string;
  outputPath?: string;
  dryRun?: boolean;
  regenerateModel?: boolean;
}

export interface AddCommandOptions extends ResolvedOptions {
  configPath?: string;
  interactive: boolean;
  verbose: boolean;
}

// === Artifacts ===

export type ArtifactCategory =
  | 'Model'
  | 'WriteOperation'
  | 'ReadOperation'
  | 'Mapping'
  | 'Endpoint'
  | 'AccessControl'
  | 'Test';

export type DescriptorKind =
  | 'model'
  | 'persistence-mapping'
  | 'write-command'
  | 'write-validator'
  | 'list-query'
  | 'by-id-query'
  | 'endpoint'
  | 'access-control'
  | 'event'
  | 'mapping-profile'
  | 'test';

export interface TestSubject {
  logicalName: string;
  kind: DescriptorKind;
  category: ArtifactCategory;
}

export interface ArtifactDescriptor {
  category: ArtifactCategory;
  kind: DescriptorKind;
  relativePath: string;
  logicalName: string;
  dependsOn: string[];
  operation?: Operation;
  /** Present on test descriptors only. */
  subjectOf?: TestSubject;
  /** Fingerprint of the logical content; equal paths with different intents conflict. */
  intent: string;
}

export interface RenderedArtifact {
  path: string;
  content: string;
  category: ArtifactCategory;
  kind: DescriptorKind;
  logicalName: string;
}

export interface ExistingArtifact {
  relativePath: string;
  kind: DescriptorKind;
  /** Undefined when the file could not be attributed to a tier. */
  entityTier?: EntityTier;
}

// === Emission ===

export type EmitMode = 'materialize' | 'preview';

export type WriteStatus = 'planned' | 'written' | 'failed' | 'not-attempted';

export interface ManifestEntry {
  category: ArtifactCategory;
  relativePath: string;
  logicalName: string;
  writeStatus: WriteStatus;
  error?: string;
}

export interface PreviewNode {
  relativePath: string;
  logicalName: string;
  bytes: number;
}

export interface PreviewGroup {
  category: ArtifactCategory;
  artifacts: PreviewNode[];
}

export interface PreviewTree {
  entityName: string;
  outputRoot: string;
  groups: PreviewGroup[];
}

export interface EmitResult {
  mode: EmitMode;
  manifest: ManifestEntry[];
  tree: PreviewTree;
}

export interface GenerationResult {
  plan: GenerationPlan;
  descriptors: ArtifactDescriptor[];
  artifacts: RenderedArtifact[];
  emit: EmitResult;
  nextSteps: string[];
}

// === Configuration ===

export interface ProjectConfig {
  version: string;
  project: {
    name: string;
    namespace: string;
  };
  paths: {
    rootPath: string;
    domainPath: string;
    applicationPath: string;
    persistencePath: string;
    controllersPath: string;
    applicationTestsPath: string;
  };
  codeGeneration: {
    defaultEntityType: string;
    generateEvents: boolean;
    generateMappingProfiles: boolean;
    generatePermissions: boolean;
    generateTests: boolean;
  };
  templates: {
    defaultTemplate: string;
  };
}

export const CONFIG_FILE_NAME = 'layergen.json';
