import { describe, it, expect } from 'vitest';
import {
  composeTemplate, composeArtifact, renderArtifacts, normalizeWhitespace, findUnresolvedMarkers,
} from '../../src/templates/templateComposer';
import { createTemplate } from '../../src/templates/createTemplate';
import { TemplateContext } from '../../src/templates/templateTypes';
import { planArtifacts } from '../../src/planners/artifactPlanner';
import { TemplateError } from '../../src/shared/errors';
import { scenarioAPlan } from '../helpers/fixtures';

function context(): TemplateContext {
  const plan = scenarioAPlan();
  const [descriptor] = planArtifacts(plan);
  return { plan, descriptor, names: plan.entity };
}

const body = () => `class X
{
    {{slot:fields}}

    void M({{slot:params}})
    {
        {{slot:statements}}
    }
}
`;

describe('composeTemplate', () => {
  it('joins fragments by slot format and indents to the marker', () => {
    const skeleton = createTemplate({
      kind: 'model',
      slots: { fields: 'lines', params: 'list', statements: 'blocks' },
      body,
      fragments: [
        { slot: 'fields', render: () => 'int x;' },
        { slot: 'fields', render: () => 'int y;' },
        { slot: 'params', render: () => 'int p' },
        { slot: 'params', render: () => 'int q' },
        { slot: 'statements', render: () => 'Foo();' },
        { slot: 'statements', render: () => 'Bar();' },
      ],
    });

    expect(composeTemplate(skeleton, context())).toBe(`class X
{
    int x;
    int y;

    void M(int p, int q)
    {
        Foo();

        Bar();
    }
}
`);
  });

  it('drops the line of an empty standalone slot and the blank line it leaves after a brace', () => {
    const skeleton = createTemplate({
      kind: 'model',
      slots: { fields: 'lines', params: 'list', statements: 'blocks' },
      body,
      fragments: [
        { slot: 'fields', when: () => false, render: () => 'int x;' },
        { slot: 'statements', render: () => 'Foo();' },
      ],
    });

    expect(composeTemplate(skeleton, context())).toBe(`class X
{
    void M()
    {
        Foo();
    }
}
`);
  });

  it('joins a standalone list with a comma per line', () => {
    const skeleton = createTemplate({
      kind: 'model',
      slots: { items: 'list' },
      body: () => 'var all =\n[\n    {{slot:items}}\n];\n',
      fragments: [
        { slot: 'items', render: () => 'A' },
        { slot: 'items', render: () => 'B' },
      ],
    });

    expect(composeTemplate(skeleton, context())).toBe('var all =\n[\n    A,\n    B\n];\n');
  });

  it('rejects a marker for an undeclared slot', () => {
    const skeleton = createTemplate({ kind: 'model', slots: {}, body: () => '{{slot:missing}}\n' });
    expect(() => composeTemplate(skeleton, context())).toThrow(TemplateError);
  });

  it('rejects a fragment aimed at an undeclared slot', () => {
    expect(() => createTemplate({
      kind: 'model',
      slots: {},
      body: () => '',
      fragments: [{ slot: 'nowhere', render: () => 'x' }],
    })).toThrow(TemplateError);
  });
});

describe('normalizeWhitespace', () => {
  it('collapses blank runs and strips trailing whitespace', () => {
    expect(normalizeWhitespace('a  \n\n\n\nb\n\n')).toBe('a\n\nb\n');
  });

  it('removes blank lines just inside braces', () => {
    expect(normalizeWhitespace('{\n\n  x\n\n}')).toBe('{\n  x\n}\n');
  });

  it('drops leading blank lines', () => {
    expect(normalizeWhitespace('\n\nx')).toBe('x\n');
  });
});

describe('findUnresolvedMarkers', () => {
  it('lists leftover markers', () => {
    expect(findUnresolvedMarkers('a {{slot:x}} b {{other}}')).toEqual(['{{slot:x}}', '{{other}}']);
    expect(findUnresolvedMarkers('new { id }')).toEqual([]);
  });
});

describe('renderArtifacts', () => {
  it('renders one artifact per descriptor, in order', () => {
    const plan = scenarioAPlan();
    const descriptors = planArtifacts(plan);
    const artifacts = renderArtifacts(plan, descriptors);

    expect(artifacts.map(a => a.path)).toEqual(descriptors.map(d => d.relativePath));
    expect(artifacts.map(a => a.category)).toEqual(descriptors.map(d => d.category));
  });

  it('is deterministic', () => {
    const plan = scenarioAPlan();
    const descriptors = planArtifacts(plan);
    expect(renderArtifacts(plan, descriptors)).toEqual(renderArtifacts(plan, descriptors));
  });

  it('renders access-control constants for the requested operations only', () => {
    const plan = scenarioAPlan();
    const access = planArtifacts(plan).find(d => d.kind === 'access-control');
    expect(access).toBeDefined();
    if (!access) return;

    expect(composeArtifact(plan, access)).toBe(`namespace Domain.PermissionsConstants;

/// <summary>
/// Permission names guarding Orders operations.
/// </summary>
public static class OrdersPermissions
{
    public const string Create = "Permissions.Orders.Create";
    public const string View = "Permissions.Orders.View";

    public static readonly string[] All =
    [
        Create,
        View
    ];
}
`);
  });
});
