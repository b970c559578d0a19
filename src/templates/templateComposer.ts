import { ArtifactDescriptor, GenerationPlan, RenderedArtifact } from '../types';
import { TemplateError } from '../shared/errors';
import { SlotFormat, TemplateContext, TemplateSkeleton } from './templateTypes';
import { templateFor } from './index';

const SLOT_MARKER = /\{\{slot:([A-Za-z][\w-]*)\}\}/g;
const STANDALONE_MARKER = /^(\s*)\{\{slot:([A-Za-z][\w-]*)\}\}\s*$/;

// ── Rendering ───────────────────────────────────────────────────────

/**
 * Renders every descriptor in order. Pure: the same plan and descriptors
 * always produce byte-identical artifacts.
 */
export function renderArtifacts(plan: GenerationPlan, descriptors: ArtifactDescriptor[]): RenderedArtifact[] {
  return descriptors.map(descriptor => ({
    path: descriptor.relativePath,
    content: composeArtifact(plan, descriptor),
    category: descriptor.category,
    kind: descriptor.kind,
    logicalName: descriptor.logicalName,
  }));
}

export function composeArtifact(plan: GenerationPlan, descriptor: ArtifactDescriptor): string {
  const ctx: TemplateContext = { plan, descriptor, names: plan.entity };
  return composeTemplate(templateFor(descriptor.kind), ctx);
}

// ── Composition ─────────────────────────────────────────────────────

export function composeTemplate(skeleton: TemplateSkeleton, ctx: TemplateContext): string {
  const filled = new Map<string, string[]>();

  for (const fragment of skeleton.fragments) {
    if (fragment.when && !fragment.when(ctx)) continue;
    const text = trimBlankEdges(fragment.render(ctx));
    if (text.trim() === '') continue;
    const parts = filled.get(fragment.slot) ?? [];
    parts.push(text);
    filled.set(fragment.slot, parts);
  }

  const formatOf = (name: string): SlotFormat => {
    const format = skeleton.slots[name];
    if (format === undefined) {
      throw new TemplateError(`Undeclared slot "${name}"`, skeleton.kind);
    }
    return format;
  };

  const out: string[] = [];
  for (const line of skeleton.body(ctx).split('\n')) {
    const standalone = STANDALONE_MARKER.exec(line);
    if (standalone) {
      const [, indent, name] = standalone;
      const parts = filled.get(name) ?? [];
      formatOf(name);
      if (parts.length === 0) continue;
      for (const piece of joinParts(parts, formatOf(name), false).split('\n')) {
        out.push(piece.length > 0 ? indent + piece : '');
      }
      continue;
    }

    out.push(line.replace(SLOT_MARKER, (_match, name: string) =>
      joinParts(filled.get(name) ?? [], formatOf(name), true)));
  }

  const content = normalizeWhitespace(out.join('\n'));
  const leftovers = findUnresolvedMarkers(content);
  if (leftovers.length > 0) {
    throw new TemplateError(`Unresolved slot markers: ${leftovers.join(', ')}`, skeleton.kind);
  }
  return content;
}

function joinParts(parts: string[], format: SlotFormat, inline: boolean): string {
  switch (format) {
    case 'lines':
      return parts.join(inline ? ' ' : '\n');
    case 'blocks':
      return parts.join(inline ? ' ' : '\n\n');
    case 'list':
      return parts.join(inline ? ', ' : ',\n');
  }
}

function trimBlankEdges(text: string): string {
  const lines = text.split('\n');
  while (lines.length > 0 && lines[0].trim() === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();
  return lines.join('\n');
}

// ── Post-processing ─────────────────────────────────────────────────

/**
 * Strips trailing whitespace, collapses blank-line runs, drops blank lines
 * just inside braces, and ends the text with exactly one newline.
 */
export function normalizeWhitespace(text: string): string {
  const lines = text.split('\n').map(l => l.trimEnd());
  const result: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line === '') {
      const prev = result.length > 0 ? result[result.length - 1] : '';
      const next = lines.slice(i + 1).find(l => l !== '');
      if (result.length === 0 || prev === '') continue;
      if (prev.endsWith('{') || prev.endsWith('[')) continue;
      if (next === undefined) continue;
      const nextTrimmed = next.trimStart();
      if (nextTrimmed.startsWith('}') || nextTrimmed.startsWith(']')) continue;
    }
    result.push(line);
  }

  return result.join('\n') + '\n';
}

export function findUnresolvedMarkers(content: string): string[] {
  return [...content.matchAll(/\{\{[^}]*\}\}/g)].map(m => m[0]);
}
