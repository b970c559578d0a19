import {
  ResolvedOptions, ProjectConfig, GenerationPlan, Operation, OPERATIONS,
  EntityTier, ENTITY_TIERS, TemplateId, TEMPLATE_IDS, LayerLayout,
} from '../types';
import {
  InvalidArgumentError, InvalidEntityTypeError, NoOperationSelectedError,
} from '../shared/errors';
import { resolveEntityNames } from './namingResolver';

/**
 * Merges invocation flags over project defaults into one frozen plan.
 * Explicit flags always win over configuration. No I/O.
 */
export function resolveGenerationPlan(options: ResolvedOptions, config: ProjectConfig): GenerationPlan {
  const entity = resolveEntityNames(options.entityName);

  const operations = resolveOperations(options);
  if (operations.length === 0) {
    throw new NoOperationSelectedError();
  }

  const entityTier = parseEntityTier(options.entityType ?? config.codeGeneration.defaultEntityType);
  const templateId = parseTemplateId(options.template ?? config.templates.defaultTemplate);

  const flags = Object.freeze({
    generateTests: options.skipTests ? false : config.codeGeneration.generateTests,
    generatePermissions: options.skipPermissions ? false : config.codeGeneration.generatePermissions,
    generateEvents: options.events ?? config.codeGeneration.generateEvents,
    generateMappingProfiles: options.mappingProfiles ?? config.codeGeneration.generateMappingProfiles,
  });

  return Object.freeze({
    entity,
    operations: Object.freeze(operations),
    entityTier,
    flags,
    templateId,
    outputRoot: options.outputPath ?? config.paths.rootPath,
    layout: Object.freeze(layoutFromConfig(config)),
    regenerateModel: options.regenerateModel ?? false,
  });
}

export function resolveOperations(options: ResolvedOptions): Operation[] {
  if (options.all) return [...OPERATIONS];

  const requested: Record<Operation, boolean | undefined> = {
    Create: options.create,
    Read: options.read,
    Update: options.update,
    Delete: options.delete,
  };
  return OPERATIONS.filter(op => requested[op] === true);
}

export function parseEntityTier(value: string): EntityTier {
  const match = ENTITY_TIERS.find(t => t.toLowerCase() === value.trim().toLowerCase());
  if (!match) {
    throw new InvalidEntityTypeError(value, ENTITY_TIERS);
  }
  return match;
}

export function parseTemplateId(value: string): TemplateId {
  const match = TEMPLATE_IDS.find(t => t === value.trim().toLowerCase());
  if (!match) {
    throw new InvalidArgumentError(
      `Unknown template: ${value}. Valid options: ${TEMPLATE_IDS.join(', ')}`,
      'template',
      value,
    );
  }
  return match;
}

function layoutFromConfig(config: ProjectConfig): LayerLayout {
  return {
    modelRoot: config.paths.domainPath,
    operationRoot: config.paths.applicationPath,
    persistenceRoot: config.paths.persistencePath,
    endpointRoot: config.paths.controllersPath,
    testsRoot: config.paths.applicationTestsPath,
  };
}

/** Events are emitted only when more than one operation is requested. */
export function emitsEvents(plan: GenerationPlan): boolean {
  return plan.flags.generateEvents && plan.operations.length > 1;
}

export function hasOperation(plan: GenerationPlan, operation: Operation): boolean {
  return plan.operations.includes(operation);
}
