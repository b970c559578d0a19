import { ArtifactDescriptor, GenerationPlan, tierHas } from '../types';

/**
 * Manual wiring the generated files still need. Returned as plain strings;
 * the reporter decides how to show them.
 */
export function buildNextSteps(plan: GenerationPlan, descriptors: ArtifactDescriptor[]): string[] {
  const { singularName: S, pluralName: P } = plan.entity;
  const has = (kind: ArtifactDescriptor['kind']) => descriptors.some(d => d.kind === kind);
  const steps: string[] = [];

  steps.push(`Add DbSet<${S}> ${P} to ITenantDbContext and TenantDbContext`);

  if (has('persistence-mapping')) {
    steps.push(`Apply ${S}EntityConfiguration in TenantDbContext.OnModelCreating`);
  }
  if (has('access-control')) {
    steps.push(`Add ${P}Permissions to PermissionsProvider`);
  }
  if (has('mapping-profile')) {
    steps.push(`Register ${S}MappingProfile with the Mapster TypeAdapterConfig`);
  }

  const events = descriptors.filter(d => d.kind === 'event');
  if (events.length > 0 && tierHas(plan.entityTier, 'creation-audit')) {
    const values = events.map(d => d.logicalName.replace(/Event$/, ''));
    steps.push(`Add AuditLogEventType values: ${values.join(', ')}`);
  }

  if (has('model')) {
    steps.push(`Run database migration: dotnet ef migrations add Add${S}Entity`);
  }

  return steps;
}
