import { ArtifactDescriptor } from '../types';
import { LayergenError } from '../shared/errors';

/**
 * Stable topological sort: dependencies come before dependents, and among
 * descriptors that are ready at the same time the earlier-inserted one wins.
 * Edges to names outside the set are ignored.
 */
export function orderByDependencies(descriptors: ArtifactDescriptor[]): ArtifactDescriptor[] {
  const index = new Map<string, number>();
  descriptors.forEach((d, i) => index.set(d.logicalName, i));

  const pending = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const d of descriptors) {
    const deps = d.dependsOn.filter(dep => index.has(dep));
    pending.set(d.logicalName, deps.length);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(d.logicalName);
      dependents.set(dep, list);
    }
  }

  const ready = new Set<string>(descriptors.filter(d => pending.get(d.logicalName) === 0).map(d => d.logicalName));
  const ordered: ArtifactDescriptor[] = [];

  while (ready.size > 0) {
    const next = pickEarliest(ready, index);
    ready.delete(next);
    ordered.push(descriptors[index.get(next) ?? 0]);

    for (const dependent of dependents.get(next) ?? []) {
      const remaining = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, remaining);
      if (remaining === 0) ready.add(dependent);
    }
  }

  if (ordered.length !== descriptors.length) {
    const stuck = descriptors
      .filter(d => !ordered.includes(d))
      .map(d => d.logicalName);
    throw new LayergenError(`Dependency cycle among: ${stuck.join(', ')}`, 'Internal', 'E9002', { stuck });
  }

  return ordered;
}

function pickEarliest(ready: Set<string>, index: Map<string, number>): string {
  let best = '';
  let bestIndex = Number.POSITIVE_INFINITY;
  for (const name of ready) {
    const i = index.get(name) ?? Number.POSITIVE_INFINITY;
    if (i < bestIndex) {
      best = name;
      bestIndex = i;
    }
  }
  return best;
}

/** True when every descriptor appears after all of its in-set dependencies. */
export function isDependencyOrdered(descriptors: ArtifactDescriptor[]): boolean {
  const seen = new Set<string>();
  const names = new Set(descriptors.map(d => d.logicalName));
  for (const d of descriptors) {
    if (d.dependsOn.some(dep => names.has(dep) && !seen.has(dep))) return false;
    seen.add(d.logicalName);
  }
  return true;
}
