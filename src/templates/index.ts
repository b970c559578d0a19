import { DescriptorKind } from '../types';
import { TemplateSkeleton } from './templateTypes';
import { modelTemplate } from './csharp/model.template';
import { persistenceMappingTemplate } from './csharp/persistenceMapping.template';
import { writeCommandTemplate } from './csharp/writeCommand.template';
import { writeValidatorTemplate } from './csharp/writeValidator.template';
import { listQueryTemplate } from './csharp/listQuery.template';
import { byIdQueryTemplate } from './csharp/byIdQuery.template';
import { endpointTemplate } from './csharp/endpoint.template';
import { accessControlTemplate } from './csharp/accessControl.template';
import { eventTemplate } from './csharp/event.template';
import { mappingProfileTemplate } from './csharp/mappingProfile.template';
import { testTemplate } from './csharp/test.template';

/** One skeleton per descriptor kind. */
export const TEMPLATE_REGISTRY: Readonly<Record<DescriptorKind, TemplateSkeleton>> = {
  'model': modelTemplate,
  'persistence-mapping': persistenceMappingTemplate,
  'write-command': writeCommandTemplate,
  'write-validator': writeValidatorTemplate,
  'list-query': listQueryTemplate,
  'by-id-query': byIdQueryTemplate,
  'endpoint': endpointTemplate,
  'access-control': accessControlTemplate,
  'event': eventTemplate,
  'mapping-profile': mappingProfileTemplate,
  'test': testTemplate,
};

export function templateFor(kind: DescriptorKind): TemplateSkeleton {
  return TEMPLATE_REGISTRY[kind];
}

export { createTemplate } from './createTemplate';
export type { TemplateContext, TemplateFragment, TemplateSkeleton, SlotFormat } from './templateTypes';
