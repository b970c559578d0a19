import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { emitArtifacts, buildPreviewTree, EmitterFileSystem } from '../../src/generators/emitter';
import { IOFailureError } from '../../src/shared/errors';
import { RenderedArtifact } from '../../src/types';

const artifacts: RenderedArtifact[] = [
  { path: 'Domain/Orders/Order.cs', content: 'class Order {}\n', category: 'Model', kind: 'model', logicalName: 'Order' },
  {
    path: 'Application/Orders/Commands/CreateOrder/CreateOrderCommand.cs',
    content: 'class CreateOrderCommand {}\n',
    category: 'WriteOperation',
    kind: 'write-command',
    logicalName: 'CreateOrderCommand',
  },
  { path: 'Api/OrdersController.cs', content: 'class OrdersController {}\n', category: 'Endpoint', kind: 'endpoint', logicalName: 'OrdersController' },
  {
    path: 'Application/Orders/Commands/CreateOrder/CreateOrderCommandValidator.cs',
    content: 'class V {}\n',
    category: 'WriteOperation',
    kind: 'write-validator',
    logicalName: 'CreateOrderCommandValidator',
  },
];

describe('emitArtifacts', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'layergen-emit-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes every artifact under the output root', () => {
    const result = emitArtifacts(artifacts, { mode: 'materialize', outputRoot: tmpDir, entityName: 'Order' });

    for (const artifact of artifacts) {
      expect(fs.readFileSync(path.join(tmpDir, artifact.path), 'utf-8')).toBe(artifact.content);
    }
    expect(result.manifest.map(e => e.writeStatus)).toEqual(['written', 'written', 'written', 'written']);
  });

  it('overwrites existing files', () => {
    const target = path.join(tmpDir, 'Domain/Orders/Order.cs');
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, 'old', 'utf-8');

    emitArtifacts(artifacts, { mode: 'materialize', outputRoot: tmpDir, entityName: 'Order' });

    expect(fs.readFileSync(target, 'utf-8')).toBe('class Order {}\n');
  });

  it('writes nothing in preview mode', () => {
    const result = emitArtifacts(artifacts, { mode: 'preview', outputRoot: tmpDir, entityName: 'Order' });

    expect(fs.readdirSync(tmpDir)).toEqual([]);
    expect(result.manifest.every(e => e.writeStatus === 'planned')).toBe(true);
  });

  it('returns the same tree and paths in both modes', () => {
    const preview = emitArtifacts(artifacts, { mode: 'preview', outputRoot: tmpDir, entityName: 'Order' });
    const written = emitArtifacts(artifacts, { mode: 'materialize', outputRoot: tmpDir, entityName: 'Order' });

    expect(written.tree).toEqual(preview.tree);
    const pairs = (r: typeof preview) => r.manifest.map(e => [e.relativePath, e.category]);
    expect(pairs(written)).toEqual(pairs(preview));
  });

  it('stops at the first failure and reports every artifact', () => {
    const written: string[] = [];
    const failing: EmitterFileSystem = {
      mkdir: () => undefined,
      writeFile: filePath => {
        if (filePath.endsWith('CreateOrderCommand.cs')) throw new Error('disk full');
        written.push(filePath);
      },
    };

    try {
      emitArtifacts(artifacts, { mode: 'materialize', outputRoot: '/out', entityName: 'Order', fs: failing });
      expect.unreachable();
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(IOFailureError);
      if (!(error instanceof IOFailureError)) return;

      expect(error.code).toBe('E3001');
      expect(error.manifest.map(e => [e.logicalName, e.writeStatus])).toEqual([
        ['Order', 'written'],
        ['CreateOrderCommand', 'failed'],
        ['OrdersController', 'not-attempted'],
        ['CreateOrderCommandValidator', 'not-attempted'],
      ]);
      expect(error.manifest[1].error).toBe('disk full');
    }
    expect(written).toEqual([path.join('/out', 'Domain/Orders/Order.cs')]);
  });

  it('reports a failing directory creation the same way', () => {
    const failing: EmitterFileSystem = {
      mkdir: () => {
        throw new Error('permission denied');
      },
      writeFile: () => undefined,
    };

    expect(() => emitArtifacts(artifacts, { mode: 'materialize', outputRoot: '/out', entityName: 'Order', fs: failing }))
      .toThrow('Failed to write Domain/Orders/Order.cs: permission denied');
  });
});

describe('buildPreviewTree', () => {
  it('groups by category in order of first appearance', () => {
    const tree = buildPreviewTree(artifacts, '/out', 'Order');

    expect(tree.entityName).toBe('Order');
    expect(tree.outputRoot).toBe('/out');
    expect(tree.groups.map(g => g.category)).toEqual(['Model', 'WriteOperation', 'Endpoint']);
    expect(tree.groups[1].artifacts.map(a => a.logicalName)).toEqual(['CreateOrderCommand', 'CreateOrderCommandValidator']);
    expect(tree.groups[0].artifacts[0].bytes).toBe(15);
  });
});
