import { EntityTier, Operation, TierCapability, WriteOperation, tierHas } from '../types';
import { emitsEvents, hasOperation } from '../resolvers/optionResolver';
import { FragmentPredicate, TemplateContext } from './templateTypes';

// ── Predicates ──────────────────────────────────────────────────────

export const usesDocs: FragmentPredicate = ctx => ctx.plan.templateId === 'default';
export const withPermissions: FragmentPredicate = ctx => ctx.plan.flags.generatePermissions;
export const withEvents: FragmentPredicate = ctx => emitsEvents(ctx.plan);
export const withMapping: FragmentPredicate = ctx => ctx.plan.flags.generateMappingProfiles;
export const withoutMapping: FragmentPredicate = ctx => !ctx.plan.flags.generateMappingProfiles;

export function tierWith(capability: TierCapability): FragmentPredicate {
  return ctx => tierHas(ctx.plan.entityTier, capability);
}

export function tierWithout(capability: TierCapability): FragmentPredicate {
  return ctx => !tierHas(ctx.plan.entityTier, capability);
}

/** The descriptor being rendered belongs to this operation. */
export function isOperation(...operations: Operation[]): FragmentPredicate {
  return ctx => ctx.descriptor.operation !== undefined && operations.includes(ctx.descriptor.operation);
}

/** The plan requests this operation, whatever is being rendered. */
export function planHas(operation: Operation): FragmentPredicate {
  return ctx => hasOperation(ctx.plan, operation);
}

export function allOf(...predicates: FragmentPredicate[]): FragmentPredicate {
  return ctx => predicates.every(p => p(ctx));
}

export function anyOf(...predicates: FragmentPredicate[]): FragmentPredicate {
  return ctx => predicates.some(p => p(ctx));
}

// ── Naming tables ───────────────────────────────────────────────────

export const PERMISSION_ACTION: Record<Operation, string> = {
  Create: 'Create',
  Read: 'View',
  Update: 'Edit',
  Delete: 'Delete',
};

export const EVENT_SUFFIX: Record<WriteOperation, string> = {
  Create: 'Created',
  Update: 'Updated',
  Delete: 'Deleted',
};

const BASE_ENTITY: Record<EntityTier, string> = {
  Basic: 'Entity<Guid>',
  Audited: 'AuditedEntity<Guid>',
  FullyAudited: 'FullyAuditedEntity<Guid>',
};

export function baseEntityType(tier: EntityTier): string {
  return BASE_ENTITY[tier];
}

export function writeOperationOf(ctx: TemplateContext): WriteOperation {
  const op = ctx.descriptor.operation;
  return op === 'Update' || op === 'Delete' ? op : 'Create';
}

/** The create/update DTO is declared in the Create command, or in Update when Create is absent. */
export function dtoOwner(ctx: TemplateContext): WriteOperation | undefined {
  if (hasOperation(ctx.plan, 'Create')) return 'Create';
  if (hasOperation(ctx.plan, 'Update')) return 'Update';
  return undefined;
}

export function dtoNamespace(ctx: TemplateContext): string | undefined {
  const owner = dtoOwner(ctx);
  if (!owner) return undefined;
  const { singularName, pluralName } = ctx.names;
  return `Application.${pluralName}.Commands.${owner}${singularName}`;
}

export const ownsDto: FragmentPredicate = ctx =>
  ctx.descriptor.operation !== undefined && ctx.descriptor.operation === dtoOwner(ctx);

/** Soft delete replaces removal for tiers that track deletion. */
export const softDeletes: FragmentPredicate = tierWith('soft-delete');

// ── Shared member tables ────────────────────────────────────────────

export interface DtoField {
  name: string;
  type: string;
  initializer?: string;
  when?: FragmentPredicate;
}

/** Fields of the list and read DTOs. */
export const READ_DTO_FIELDS: readonly DtoField[] = [
  { name: 'Id', type: 'Guid' },
  { name: 'Name', type: 'string', initializer: 'string.Empty' },
  { name: 'CreatedAt', type: 'DateTime', when: tierWith('creation-audit') },
];

export function readDtoFields(ctx: TemplateContext): DtoField[] {
  return READ_DTO_FIELDS.filter(f => !f.when || f.when(ctx));
}

/** `Field = source.Field` pairs for an explicit object initializer. */
export function initializerLines(ctx: TemplateContext, source: string): string {
  return readDtoFields(ctx).map(f => `    ${f.name} = ${source}.${f.name}`).join(',\n');
}

export interface HandlerParameter {
  type: string;
  name: string;
  when?: FragmentPredicate;
}

/** Constructor parameters of a write command handler, in declaration order. */
export const COMMAND_HANDLER_PARAMETERS: readonly HandlerParameter[] = [
  { type: 'ITenantDbContext', name: 'dbContext' },
  { type: 'IPublisher', name: 'publisher', when: withEvents },
  { type: 'ICurrentUserService', name: 'currentUserService', when: allOf(isOperation('Delete'), softDeletes) },
];

export function commandHandlerParameters(ctx: TemplateContext): HandlerParameter[] {
  return COMMAND_HANDLER_PARAMETERS.filter(p => !p.when || p.when(ctx));
}

// ── Text helpers ────────────────────────────────────────────────────

export function docSummary(text: string): string {
  return `/// <summary>\n/// ${text}\n/// </summary>`;
}

/** Prefixes a member with its summary when the template carries docs. */
export function documented(ctx: TemplateContext, summary: string, code: string): string {
  return usesDocs(ctx) ? `${docSummary(summary)}\n${code}` : code;
}
