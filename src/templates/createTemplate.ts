import { DescriptorKind } from '../types';
import { TemplateError } from '../shared/errors';
import { SlotFormat, TemplateContext, TemplateFragment, TemplateSkeleton } from './templateTypes';

export interface TemplateConfig<S extends string = string> {
  kind: DescriptorKind;
  slots: Record<S, SlotFormat>;
  body: (ctx: TemplateContext) => string;
  fragments?: TemplateFragment[];
}

export function createTemplate<S extends string>(config: TemplateConfig<S>): TemplateSkeleton {
  const fragments = config.fragments ?? [];

  for (const fragment of fragments) {
    if (!(fragment.slot in config.slots)) {
      throw new TemplateError(`Fragment targets undeclared slot "${fragment.slot}"`, config.kind);
    }
  }

  return {
    kind: config.kind,
    slots: Object.freeze({ ...config.slots }),
    body: config.body,
    fragments: Object.freeze([...fragments]),
  };
}
