import { createTemplate } from '../createTemplate';
import { TemplateContext } from '../templateTypes';
import { docSummary, dtoNamespace, planHas, readDtoFields, usesDocs } from '../templateHelpers';

function mapLines(ctx: TemplateContext): string {
  return readDtoFields(ctx).map(f => `    .Map(dest => dest.${f.name}, src => src.${f.name})`).join('\n');
}

const hasDto = (ctx: TemplateContext): boolean => dtoNamespace(ctx) !== undefined;

export const mappingProfileTemplate = createTemplate({
  kind: 'mapping-profile',
  slots: { usings: 'lines', summary: 'lines', mappings: 'blocks' },
  body: ({ names: { singularName: S, pluralName: P } }) => `{{slot:usings}}

namespace Application.${P}.Mapping;

{{slot:summary}}
public sealed class ${S}MappingProfile : IRegister
{
    public void Register(TypeAdapterConfig config)
    {
        {{slot:mappings}}
    }
}
`,
  fragments: [
    { slot: 'usings', when: hasDto, render: ctx => `using ${dtoNamespace(ctx) ?? ''};` },
    {
      slot: 'usings',
      when: planHas('Read'),
      render: ({ names }) => `using Application.${names.pluralName}.Queries.Get${names.pluralName};`,
    },
    {
      slot: 'usings',
      when: planHas('Read'),
      render: ({ names }) => `using Application.${names.pluralName}.Queries.Get${names.singularName}ById;`,
    },
    { slot: 'usings', render: ({ names }) => `using Domain.${names.pluralName};` },
    { slot: 'usings', render: () => 'using Mapster;' },

    {
      slot: 'summary',
      when: usesDocs,
      render: ({ names }) => docSummary(`Mapster configuration for ${names.singularName} DTOs.`),
    },

    {
      slot: 'mappings',
      when: planHas('Read'),
      render: ctx => `config.NewConfig<${ctx.names.singularName}, ${ctx.names.singularName}ForListDto>()
${mapLines(ctx)};`,
    },
    {
      slot: 'mappings',
      when: planHas('Read'),
      render: ctx => `config.NewConfig<${ctx.names.singularName}, ${ctx.names.singularName}ForReadDto>()
${mapLines(ctx)};`,
    },
    {
      slot: 'mappings',
      when: hasDto,
      render: ({ names: { singularName: S } }) => `config.NewConfig<${S}ForCreateUpdateDto, ${S}>()
    .ConstructUsing(src => ${S}.Create(Guid.NewGuid(), src.Name));`,
    },
  ],
});
