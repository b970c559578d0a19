import { describe, it, expect } from 'vitest';
import { resolveGenerationPlan, resolveOperations, emitsEvents } from '../../src/resolvers/optionResolver';
import {
  InvalidArgumentError, InvalidEntityTypeError, NoOperationSelectedError,
} from '../../src/shared/errors';
import { testConfig, planFor } from '../helpers/fixtures';

describe('resolveOperations', () => {
  it('returns every operation in canonical order for --all', () => {
    expect(resolveOperations({ entityName: 'order', all: true })).toEqual(['Create', 'Read', 'Update', 'Delete']);
  });

  it('keeps canonical order regardless of flag order', () => {
    expect(resolveOperations({ entityName: 'order', delete: true, create: true })).toEqual(['Create', 'Delete']);
  });
});

describe('resolveGenerationPlan', () => {
  it('fails with NoOperationSelected when no operation is requested', () => {
    expect(() => resolveGenerationPlan({ entityName: 'order' }, testConfig())).toThrow(NoOperationSelectedError);
  });

  it('validates the name before the operations', () => {
    expect(() => resolveGenerationPlan({ entityName: '9lives' }, testConfig())).toThrow(InvalidArgumentError);
  });

  it('takes defaults from configuration', () => {
    const plan = planFor({ entityName: 'order', read: true });
    expect(plan.entityTier).toBe('Audited');
    expect(plan.templateId).toBe('default');
    expect(plan.outputRoot).toBe('/work');
    expect(plan.flags).toEqual({
      generateTests: true,
      generatePermissions: true,
      generateEvents: true,
      generateMappingProfiles: true,
    });
    expect(plan.layout).toEqual({
      modelRoot: 'src/Core/Domain',
      operationRoot: 'src/Core/Application',
      persistenceRoot: 'src/Infra/Persistence',
      endpointRoot: 'src/Apps/Api/Controllers',
      testsRoot: 'tests/Application/ApplicationTests',
    });
  });

  it('lets explicit flags override configuration', () => {
    const plan = planFor(
      {
        entityName: 'order',
        all: true,
        skipTests: true,
        skipPermissions: true,
        events: true,
        mappingProfiles: false,
        entityType: 'basic',
        template: 'Minimal',
        outputPath: '/elsewhere',
      },
      { codeGeneration: { generateEvents: false, generateMappingProfiles: true } },
    );
    expect(plan.flags).toEqual({
      generateTests: false,
      generatePermissions: false,
      generateEvents: true,
      generateMappingProfiles: false,
    });
    expect(plan.entityTier).toBe('Basic');
    expect(plan.templateId).toBe('minimal');
    expect(plan.outputRoot).toBe('/elsewhere');
  });

  it('matches tiers case-insensitively and returns canonical casing', () => {
    expect(planFor({ entityName: 'order', read: true, entityType: 'FULLYAUDITED' }).entityTier).toBe('FullyAudited');
  });

  it('rejects an unknown tier override', () => {
    expect(() => planFor({ entityName: 'order', read: true, entityType: 'Premium' })).toThrow(InvalidEntityTypeError);
  });

  it('rejects an unknown configured default tier', () => {
    expect(() => planFor({ entityName: 'order', read: true }, { codeGeneration: { defaultEntityType: 'Premium' } }))
      .toThrow(InvalidEntityTypeError);
  });

  it('rejects an unknown template', () => {
    expect(() => planFor({ entityName: 'order', read: true, template: 'fancy' })).toThrow(InvalidArgumentError);
  });

  it('checks the tier before the template', () => {
    expect(() => planFor({ entityName: 'order', read: true, entityType: 'Premium', template: 'fancy' }))
      .toThrow(InvalidEntityTypeError);
  });

  it('freezes the plan', () => {
    const plan = planFor({ entityName: 'order', read: true });
    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.flags)).toBe(true);
    expect(Object.isFrozen(plan.operations)).toBe(true);
  });
});

describe('emitsEvents', () => {
  it('needs events enabled and more than one operation', () => {
    expect(emitsEvents(planFor({ entityName: 'order', create: true, update: true }))).toBe(true);
    expect(emitsEvents(planFor({ entityName: 'order', create: true }))).toBe(false);
    expect(emitsEvents(planFor({ entityName: 'order', all: true, events: false }))).toBe(false);
  });
});
