import * as path from 'path';
import {
  GenerationPlan, ArtifactDescriptor, ArtifactCategory, DescriptorKind,
  ExistingArtifact, Operation, WriteOperation,
} from '../types';
import { ConflictingArtifactError } from '../shared/errors';
import { emitsEvents } from '../resolvers/optionResolver';
import { orderByDependencies } from './dependencyOrder';

const posix = path.posix;

const EVENT_SUFFIX: Record<WriteOperation, string> = {
  Create: 'Created',
  Update: 'Updated',
  Delete: 'Deleted',
};

// ── Entry point ─────────────────────────────────────────────────────

/**
 * Expands a plan into its dependency-ordered descriptor set.
 *
 * `existing` describes files already sitting on planned paths. A model of a
 * different tier on the model path is a conflict; a matching model is left
 * alone unless the plan asks to regenerate it. Throws before anything is
 * rendered or written.
 */
export function planArtifacts(plan: GenerationPlan, existing: ExistingArtifact[] = []): ArtifactDescriptor[] {
  const model = modelDescriptor(plan);
  const includeModel = checkExistingArtifacts(plan, model, existing);

  const planned: ArtifactDescriptor[] = [];
  if (includeModel) planned.push(model);
  planned.push(persistenceMappingDescriptor(plan));

  if (plan.flags.generatePermissions) {
    planned.push(accessControlDescriptor(plan));
  }

  const operationDescriptors: ArtifactDescriptor[] = [];
  for (const operation of plan.operations) {
    operationDescriptors.push(...(operation === 'Read'
      ? readDescriptors(plan)
      : writeDescriptors(plan, operation)));
  }
  planned.push(...operationDescriptors);

  if (emitsEvents(plan)) {
    for (const operation of plan.operations) {
      if (operation !== 'Read') planned.push(eventDescriptor(plan, operation));
    }
  }

  const mappingProfile = plan.flags.generateMappingProfiles
    ? mappingProfileDescriptor(plan, operationDescriptors)
    : undefined;
  if (mappingProfile) planned.push(mappingProfile);

  planned.push(endpointDescriptor(plan, operationDescriptors));

  if (plan.flags.generateTests) {
    for (const subject of operationDescriptors) {
      planned.push(testDescriptor(plan, subject));
    }
  }

  const unique = rejectCollisions(planned);
  const names = new Set(unique.map(d => d.logicalName));
  for (const d of unique) {
    d.dependsOn = d.dependsOn.filter(dep => names.has(dep));
  }

  return orderByDependencies(unique);
}

/** Path of the model file for a plan, whether or not it ends up planned. */
export function modelRelativePath(plan: GenerationPlan): string {
  const { singularName, pluralName } = plan.entity;
  return posix.join(plan.layout.modelRoot, pluralName, `${singularName}.cs`);
}

export function modelLogicalName(plan: GenerationPlan): string {
  return plan.entity.singularName;
}

// ── Conflict detection ──────────────────────────────────────────────

function checkExistingArtifacts(
  plan: GenerationPlan,
  model: ArtifactDescriptor,
  existing: ExistingArtifact[],
): boolean {
  let includeModel = true;

  for (const entry of existing) {
    if (entry.relativePath !== model.relativePath) continue;

    if (entry.kind !== 'model') {
      throw new ConflictingArtifactError(entry.relativePath, `${entry.kind}:${entry.relativePath}`, model.intent);
    }
    if (entry.entityTier !== undefined && entry.entityTier !== plan.entityTier) {
      throw new ConflictingArtifactError(
        entry.relativePath,
        modelIntent(plan.entity.singularName, entry.entityTier),
        model.intent,
      );
    }
    if (!plan.regenerateModel) includeModel = false;
  }

  return includeModel;
}

/**
 * Drops exact duplicates and rejects two descriptors that claim one path
 * for different content.
 */
export function rejectCollisions(descriptors: ArtifactDescriptor[]): ArtifactDescriptor[] {
  const byPath = new Map<string, ArtifactDescriptor>();
  const result: ArtifactDescriptor[] = [];

  for (const d of descriptors) {
    const key = d.relativePath.toLowerCase();
    const prior = byPath.get(key);
    if (prior) {
      if (prior.intent !== d.intent) {
        throw new ConflictingArtifactError(d.relativePath, prior.intent, d.intent);
      }
      continue;
    }
    byPath.set(key, d);
    result.push(d);
  }

  return result;
}

function modelIntent(singularName: string, tier: string): string {
  return `model:${singularName}:${tier}`;
}

// ── Descriptor builders ─────────────────────────────────────────────

function descriptor(
  kind: DescriptorKind,
  category: ArtifactCategory,
  relativePath: string,
  logicalName: string,
  dependsOn: string[],
  extra: Partial<Pick<ArtifactDescriptor, 'operation' | 'subjectOf'>> = {},
): ArtifactDescriptor {
  return {
    category,
    kind,
    relativePath,
    logicalName,
    dependsOn,
    intent: `${kind}:${logicalName}`,
    ...extra,
  };
}

function modelDescriptor(plan: GenerationPlan): ArtifactDescriptor {
  const d = descriptor('model', 'Model', modelRelativePath(plan), modelLogicalName(plan), []);
  d.intent = modelIntent(plan.entity.singularName, plan.entityTier);
  return d;
}

function persistenceMappingDescriptor(plan: GenerationPlan): ArtifactDescriptor {
  const { singularName, pluralName } = plan.entity;
  const name = `${singularName}EntityConfiguration`;
  return descriptor(
    'persistence-mapping',
    'Mapping',
    posix.join(plan.layout.persistenceRoot, 'Configurations', 'Tenants', pluralName, `${name}.cs`),
    name,
    [modelLogicalName(plan)],
  );
}

function accessControlDescriptor(plan: GenerationPlan): ArtifactDescriptor {
  const name = permissionsClassName(plan);
  return descriptor(
    'access-control',
    'AccessControl',
    posix.join(plan.layout.modelRoot, 'PermissionsConstants', `${name}.cs`),
    name,
    [],
  );
}

function writeDescriptors(plan: GenerationPlan, operation: WriteOperation): ArtifactDescriptor[] {
  const { singularName, pluralName } = plan.entity;
  const command = `${operation}${singularName}Command`;
  const dir = posix.join(plan.layout.operationRoot, pluralName, 'Commands', `${operation}${singularName}`);

  const commandDeps = [modelLogicalName(plan), permissionsClassName(plan)];
  if (emitsEvents(plan)) commandDeps.push(eventLogicalName(plan, operation));
  if (operation !== 'Create' && plan.operations.includes('Create')) {
    // the create/update DTO lives in the Create command
    commandDeps.push(`Create${singularName}Command`);
  }

  return [
    descriptor('write-command', 'WriteOperation', posix.join(dir, `${command}.cs`), command, commandDeps, { operation }),
    descriptor('write-validator', 'WriteOperation', posix.join(dir, `${command}Validator.cs`), `${command}Validator`, [command], { operation }),
  ];
}

function readDescriptors(plan: GenerationPlan): ArtifactDescriptor[] {
  const { singularName, pluralName } = plan.entity;
  const queries = posix.join(plan.layout.operationRoot, pluralName, 'Queries');
  const listName = `Get${pluralName}Query`;
  const byIdName = `Get${singularName}ByIdQuery`;
  const deps = [modelLogicalName(plan), permissionsClassName(plan)];
  const operation: Operation = 'Read';

  return [
    descriptor('list-query', 'ReadOperation', posix.join(queries, `Get${pluralName}`, `${listName}.cs`), listName, [...deps], { operation }),
    descriptor('by-id-query', 'ReadOperation', posix.join(queries, `Get${singularName}ById`, `${byIdName}.cs`), byIdName, [...deps], { operation }),
  ];
}

function eventDescriptor(plan: GenerationPlan, operation: WriteOperation): ArtifactDescriptor {
  const name = eventLogicalName(plan, operation);
  return descriptor(
    'event',
    'WriteOperation',
    posix.join(plan.layout.operationRoot, plan.entity.pluralName, 'Events', `${name}.cs`),
    name,
    [modelLogicalName(plan)],
    { operation },
  );
}

/** Undefined when no planned operation carries a DTO to map. */
function mappingProfileDescriptor(
  plan: GenerationPlan,
  operations: ArtifactDescriptor[],
): ArtifactDescriptor | undefined {
  const name = `${plan.entity.singularName}MappingProfile`;
  const dtoOwners = operations
    .filter(d => d.kind === 'list-query' || d.kind === 'by-id-query' || (d.kind === 'write-command' && d.operation !== 'Delete'))
    .map(d => d.logicalName);
  if (dtoOwners.length === 0) return undefined;

  return descriptor(
    'mapping-profile',
    'Mapping',
    posix.join(plan.layout.operationRoot, plan.entity.pluralName, 'Mapping', `${name}.cs`),
    name,
    [modelLogicalName(plan), ...dtoOwners],
  );
}

function endpointDescriptor(plan: GenerationPlan, operations: ArtifactDescriptor[]): ArtifactDescriptor {
  const name = `${plan.entity.pluralName}Controller`;
  return descriptor(
    'endpoint',
    'Endpoint',
    posix.join(plan.layout.endpointRoot, `${name}.cs`),
    name,
    [...operations.map(d => d.logicalName), permissionsClassName(plan)],
  );
}

function testDescriptor(plan: GenerationPlan, subject: ArtifactDescriptor): ArtifactDescriptor {
  const name = `${subject.logicalName}Tests`;
  const folder = subject.category === 'WriteOperation' ? 'Commands' : 'Queries';
  return descriptor(
    'test',
    'Test',
    posix.join(plan.layout.testsRoot, plan.entity.pluralName, folder, `${name}.cs`),
    name,
    [subject.logicalName],
    {
      operation: subject.operation,
      subjectOf: { logicalName: subject.logicalName, kind: subject.kind, category: subject.category },
    },
  );
}

function permissionsClassName(plan: GenerationPlan): string {
  return `${plan.entity.pluralName}Permissions`;
}

function eventLogicalName(plan: GenerationPlan, operation: WriteOperation): string {
  return `${plan.entity.singularName}${EVENT_SUFFIX[operation]}Event`;
}
