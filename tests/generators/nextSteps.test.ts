import { describe, it, expect } from 'vitest';
import { buildNextSteps } from '../../src/generators/nextSteps';
import { planArtifacts, modelRelativePath } from '../../src/planners/artifactPlanner';
import { scenarioAPlan, planFor } from '../helpers/fixtures';

describe('buildNextSteps', () => {
  it('lists the wiring for a new entity', () => {
    const plan = scenarioAPlan();

    expect(buildNextSteps(plan, planArtifacts(plan))).toEqual([
      'Add DbSet<Order> Orders to ITenantDbContext and TenantDbContext',
      'Apply OrderEntityConfiguration in TenantDbContext.OnModelCreating',
      'Add OrdersPermissions to PermissionsProvider',
      'Run database migration: dotnet ef migrations add AddOrderEntity',
    ]);
  });

  it('asks for audit log event types when audited entities publish events', () => {
    const plan = planFor({ entityName: 'order', create: true, delete: true, events: true, entityType: 'Audited' });

    expect(buildNextSteps(plan, planArtifacts(plan))).toContain(
      'Add AuditLogEventType values: OrderCreated, OrderDeleted',
    );
  });

  it('omits the Mapster registration when no mapping profile is planned', () => {
    const plan = planFor({ entityName: 'order', delete: true, mappingProfiles: true, skipPermissions: true });

    expect(buildNextSteps(plan, planArtifacts(plan))).toEqual([
      'Add DbSet<Order> Orders to ITenantDbContext and TenantDbContext',
      'Apply OrderEntityConfiguration in TenantDbContext.OnModelCreating',
      'Run database migration: dotnet ef migrations add AddOrderEntity',
    ]);
  });

  it('skips the migration when the model already exists', () => {
    const plan = scenarioAPlan();
    const descriptors = planArtifacts(plan, [{ relativePath: modelRelativePath(plan), kind: 'model', entityTier: 'Audited' }]);

    expect(buildNextSteps(plan, descriptors).some(s => s.startsWith('Run database migration'))).toBe(false);
  });
});
