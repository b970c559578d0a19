import { describe, it, expect } from 'vitest';
import { planArtifacts, rejectCollisions, modelRelativePath } from '../../src/planners/artifactPlanner';
import { isDependencyOrdered } from '../../src/planners/dependencyOrder';
import { ConflictingArtifactError } from '../../src/shared/errors';
import { ExistingArtifact } from '../../src/types';
import { scenarioAPlan, planFor, countKinds, descriptor } from '../helpers/fixtures';

describe('planArtifacts', () => {
  it('plans the Create + Read set for an audited entity', () => {
    const descriptors = planArtifacts(scenarioAPlan());

    expect(countKinds(descriptors)).toEqual({
      'model': 1,
      'persistence-mapping': 1,
      'access-control': 1,
      'write-command': 1,
      'write-validator': 1,
      'list-query': 1,
      'by-id-query': 1,
      'endpoint': 1,
      'test': 4,
    });
    expect(descriptors.find(d => d.kind === 'model')?.logicalName).toBe('Order');
  });

  it('orders the descriptors with dependencies first, ties by insertion', () => {
    const descriptors = planArtifacts(scenarioAPlan());

    expect(descriptors.map(d => d.logicalName)).toEqual([
      'Order',
      'OrderEntityConfiguration',
      'OrdersPermissions',
      'CreateOrderCommand',
      'CreateOrderCommandValidator',
      'GetOrdersQuery',
      'GetOrderByIdQuery',
      'OrdersController',
      'CreateOrderCommandTests',
      'CreateOrderCommandValidatorTests',
      'GetOrdersQueryTests',
      'GetOrderByIdQueryTests',
    ]);
    expect(isDependencyOrdered(descriptors)).toBe(true);
  });

  it('computes paths under the layer roots', () => {
    const byName = new Map(planArtifacts(scenarioAPlan()).map(d => [d.logicalName, d.relativePath]));

    expect(byName.get('Order')).toBe('src/Core/Domain/Orders/Order.cs');
    expect(byName.get('OrderEntityConfiguration'))
      .toBe('src/Infra/Persistence/Configurations/Tenants/Orders/OrderEntityConfiguration.cs');
    expect(byName.get('OrdersPermissions')).toBe('src/Core/Domain/PermissionsConstants/OrdersPermissions.cs');
    expect(byName.get('CreateOrderCommand'))
      .toBe('src/Core/Application/Orders/Commands/CreateOrder/CreateOrderCommand.cs');
    expect(byName.get('CreateOrderCommandValidator'))
      .toBe('src/Core/Application/Orders/Commands/CreateOrder/CreateOrderCommandValidator.cs');
    expect(byName.get('GetOrdersQuery')).toBe('src/Core/Application/Orders/Queries/GetOrders/GetOrdersQuery.cs');
    expect(byName.get('GetOrderByIdQuery'))
      .toBe('src/Core/Application/Orders/Queries/GetOrderById/GetOrderByIdQuery.cs');
    expect(byName.get('OrdersController')).toBe('src/Apps/Api/Controllers/OrdersController.cs');
    expect(byName.get('CreateOrderCommandTests'))
      .toBe('tests/Application/ApplicationTests/Orders/Commands/CreateOrderCommandTests.cs');
    expect(byName.get('GetOrdersQueryTests'))
      .toBe('tests/Application/ApplicationTests/Orders/Queries/GetOrdersQueryTests.cs');
  });

  it('links each test to its subject', () => {
    const test = planArtifacts(scenarioAPlan()).find(d => d.logicalName === 'GetOrderByIdQueryTests');
    expect(test?.dependsOn).toEqual(['GetOrderByIdQuery']);
    expect(test?.subjectOf).toEqual({ logicalName: 'GetOrderByIdQuery', kind: 'by-id-query', category: 'ReadOperation' });
  });

  it('emits one event per write operation when more than one operation is requested', () => {
    const plan = planFor({ entityName: 'order', all: true, events: true });
    const events = planArtifacts(plan).filter(d => d.kind === 'event');

    expect(events.map(d => d.relativePath)).toEqual([
      'src/Core/Application/Orders/Events/OrderCreatedEvent.cs',
      'src/Core/Application/Orders/Events/OrderUpdatedEvent.cs',
      'src/Core/Application/Orders/Events/OrderDeletedEvent.cs',
    ]);
    expect(new Set(events.map(d => d.category))).toEqual(new Set(['WriteOperation']));
  });

  it('keeps every descriptor within the seven artifact categories', () => {
    const plan = planFor({ entityName: 'order', all: true, events: true, mappingProfiles: true });
    const categories = new Set(planArtifacts(plan).map(d => d.category));

    expect([...categories].sort()).toEqual([
      'AccessControl', 'Endpoint', 'Mapping', 'Model', 'ReadOperation', 'Test', 'WriteOperation',
    ]);
  });

  it('plans no mapping profile when no operation carries a DTO', () => {
    const plan = planFor({ entityName: 'order', delete: true, mappingProfiles: true });
    expect(planArtifacts(plan).some(d => d.kind === 'mapping-profile')).toBe(false);
  });

  it('plans the mapping profile once a DTO-carrying operation joins a delete', () => {
    const plan = planFor({ entityName: 'order', update: true, delete: true, mappingProfiles: true });
    const profile = planArtifacts(plan).find(d => d.kind === 'mapping-profile');
    expect(profile?.dependsOn).toEqual(['Order', 'UpdateOrderCommand']);
  });

  it('emits no events for a single operation', () => {
    const plan = planFor({ entityName: 'order', create: true, events: true });
    expect(planArtifacts(plan).some(d => d.kind === 'event')).toBe(false);
  });

  it('places the mapping profile under the operation root', () => {
    const plan = planFor({ entityName: 'order', read: true, mappingProfiles: true });
    const profile = planArtifacts(plan).find(d => d.kind === 'mapping-profile');
    expect(profile?.relativePath).toBe('src/Core/Application/Orders/Mapping/OrderMappingProfile.cs');
  });

  it('plans the same non-test descriptors whether or not tests are generated', () => {
    const withTests = planArtifacts(scenarioAPlan());
    const withoutTests = planArtifacts(scenarioAPlan({ skipTests: true }));

    expect(withoutTests).toEqual(withTests.filter(d => d.kind !== 'test'));
  });

  describe('existing model', () => {
    const plan = scenarioAPlan();
    const existing = (entityTier?: ExistingArtifact['entityTier']): ExistingArtifact[] =>
      [{ relativePath: modelRelativePath(plan), kind: 'model', entityTier }];

    it('rejects a model of a different tier', () => {
      expect(() => planArtifacts(plan, existing('Basic'))).toThrow(ConflictingArtifactError);
    });

    it('omits a model of the same tier and drops edges to it', () => {
      const descriptors = planArtifacts(plan, existing('Audited'));

      expect(descriptors.some(d => d.kind === 'model')).toBe(false);
      expect(descriptors.find(d => d.kind === 'persistence-mapping')?.dependsOn).toEqual([]);
    });

    it('omits a model whose tier could not be determined', () => {
      expect(planArtifacts(plan, existing()).some(d => d.kind === 'model')).toBe(false);
    });

    it('keeps the model when regeneration is requested', () => {
      const regenerate = scenarioAPlan({ regenerateModel: true });
      expect(planArtifacts(regenerate, existing('Audited')).filter(d => d.kind === 'model')).toHaveLength(1);
    });
  });
});

describe('rejectCollisions', () => {
  it('drops exact duplicates', () => {
    const a = descriptor('A');
    expect(rejectCollisions([a, { ...a }])).toHaveLength(1);
  });

  it('rejects the same path claimed with different intents, ignoring case', () => {
    const a = descriptor('A', [], { relativePath: 'out/Shared.cs' });
    const b = descriptor('B', [], { relativePath: 'out/shared.cs' });
    expect(() => rejectCollisions([a, b])).toThrow(ConflictingArtifactError);
  });
});
