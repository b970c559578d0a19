import { createTemplate } from '../createTemplate';
import { TemplateFragment } from '../templateTypes';
import {
  READ_DTO_FIELDS, docSummary, initializerLines,
  usesDocs, withMapping, withPermissions, withoutMapping,
} from '../templateHelpers';

const dtoProperties: TemplateFragment[] = READ_DTO_FIELDS.map(field => ({
  slot: 'dtoProperties',
  when: field.when,
  render: () => `public ${field.type} ${field.name} { get; init; }${field.initializer ? ` = ${field.initializer};` : ''}`,
}));

export const listQueryTemplate = createTemplate({
  kind: 'list-query',
  slots: { usings: 'lines', summary: 'lines', attributes: 'lines', projection: 'lines', dtoProperties: 'lines', requestSummary: 'lines', listSummary: 'lines' },
  body: ({ names: { singularName: S, pluralName: P } }) => `{{slot:usings}}

namespace Application.${P}.Queries.Get${P};

{{slot:summary}}
{{slot:attributes}}
public sealed class Get${P}Query(${S}ForRequestDto requestDto) : ITenantQuery<PaginatedList<${S}ForListDto>>
{
    public ${S}ForRequestDto RequestDto { get; } = requestDto;

    public sealed class Handler(ITenantDbContext dbContext) : IRequestHandler<Get${P}Query, PaginatedList<${S}ForListDto>>
    {
        public async Task<PaginatedList<${S}ForListDto>> Handle(Get${P}Query request, CancellationToken cancellationToken)
        {
            return await dbContext.${P}
                .AsNoTracking()
                .OrderBy(x => x.Name)
                {{slot:projection}}
                .PaginatedListAsync(request.RequestDto, cancellationToken);
        }
    }
}

{{slot:requestSummary}}
public sealed record ${S}ForRequestDto : PaginatedRequestDto;

{{slot:listSummary}}
public sealed record ${S}ForListDto
{
    {{slot:dtoProperties}}
}
`,
  fragments: [
    { slot: 'usings', render: () => 'using Application.Common;' },
    { slot: 'usings', render: () => 'using Application.Pagination;' },
    { slot: 'usings', when: withPermissions, render: () => 'using Application.Security;' },
    { slot: 'usings', when: withPermissions, render: () => 'using Domain.PermissionsConstants;' },
    { slot: 'usings', when: withMapping, render: () => 'using Mapster;' },
    { slot: 'usings', render: () => 'using MediatR;' },
    { slot: 'usings', render: () => 'using Microsoft.EntityFrameworkCore;' },

    {
      slot: 'summary',
      when: usesDocs,
      render: ({ names }) => docSummary(`Returns a page of ${names.pluralName}.`),
    },
    {
      slot: 'attributes',
      when: withPermissions,
      render: ({ names }) => `[Authorize(Permissions = [${names.pluralName}Permissions.View])]`,
    },

    {
      slot: 'projection',
      when: withMapping,
      render: ({ names }) => `.ProjectToType<${names.singularName}ForListDto>()`,
    },
    {
      slot: 'projection',
      when: withoutMapping,
      render: ctx => `.Select(x => new ${ctx.names.singularName}ForListDto
{
${initializerLines(ctx, 'x')}
})`,
    },

    {
      slot: 'requestSummary',
      when: usesDocs,
      render: ({ names }) => docSummary(`Paging input for Get${names.pluralName}Query.`),
    },
    {
      slot: 'listSummary',
      when: usesDocs,
      render: ({ names }) => docSummary(`Row shape returned by Get${names.pluralName}Query.`),
    },
    ...dtoProperties,
  ],
});
