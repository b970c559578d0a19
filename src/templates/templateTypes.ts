import { ArtifactDescriptor, DescriptorKind, EntitySpec, GenerationPlan } from '../types';

/**
 * How the fragments filling one slot are joined.
 * - lines:  one after another
 * - blocks: separated by a blank line
 * - list:   comma separated (",\n" on its own line, ", " inline)
 */
export type SlotFormat = 'lines' | 'blocks' | 'list';

export interface TemplateContext {
  plan: GenerationPlan;
  descriptor: ArtifactDescriptor;
  names: Readonly<EntitySpec>;
}

export type FragmentPredicate = (ctx: TemplateContext) => boolean;

export interface TemplateFragment {
  slot: string;
  /** Omitted means the fragment is always included. */
  when?: FragmentPredicate;
  render: (ctx: TemplateContext) => string;
}

export interface TemplateSkeleton {
  kind: DescriptorKind;
  slots: Readonly<Record<string, SlotFormat>>;
  /** Text with {{slot:name}} markers. */
  body: (ctx: TemplateContext) => string;
  fragments: readonly TemplateFragment[];
}
