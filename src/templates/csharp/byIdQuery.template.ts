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

export const byIdQueryTemplate = createTemplate({
  kind: 'by-id-query',
  slots: { usings: 'lines', summary: 'lines', attributes: 'lines', result: 'lines', dtoSummary: 'lines', dtoProperties: 'lines' },
  body: ({ names: { singularName: S, pluralName: P } }) => `{{slot:usings}}

namespace Application.${P}.Queries.Get${S}ById;

{{slot:summary}}
{{slot:attributes}}
public sealed class Get${S}ByIdQuery(Guid id) : ITenantQuery<${S}ForReadDto>
{
    public Guid Id { get; } = id;

    public sealed class Handler(ITenantDbContext dbContext) : IRequestHandler<Get${S}ByIdQuery, ${S}ForReadDto>
    {
        public async Task<${S}ForReadDto> Handle(Get${S}ByIdQuery request, CancellationToken cancellationToken)
        {
            var entity = await dbContext.${P}
                .AsNoTracking()
                .FirstOrDefaultAsync(x => x.Id == request.Id, cancellationToken)
                ?? throw new NotFoundException(nameof(${S}), request.Id);

            {{slot:result}}
        }
    }
}

{{slot:dtoSummary}}
public sealed record ${S}ForReadDto
{
    {{slot:dtoProperties}}
}
`,
  fragments: [
    { slot: 'usings', render: () => 'using Application.Common;' },
    { slot: 'usings', render: () => 'using Application.Common.Exceptions;' },
    { slot: 'usings', when: withPermissions, render: () => 'using Application.Security;' },
    { slot: 'usings', render: ({ names }) => `using Domain.${names.pluralName};` },
    { slot: 'usings', when: withPermissions, render: () => 'using Domain.PermissionsConstants;' },
    { slot: 'usings', when: withMapping, render: () => 'using Mapster;' },
    { slot: 'usings', render: () => 'using MediatR;' },
    { slot: 'usings', render: () => 'using Microsoft.EntityFrameworkCore;' },

    {
      slot: 'summary',
      when: usesDocs,
      render: ({ names }) => docSummary(`Returns a single ${names.singularName} by its identifier.`),
    },
    {
      slot: 'attributes',
      when: withPermissions,
      render: ({ names }) => `[Authorize(Permissions = [${names.pluralName}Permissions.View])]`,
    },

    {
      slot: 'result',
      when: withMapping,
      render: ({ names }) => `return entity.Adapt<${names.singularName}ForReadDto>();`,
    },
    {
      slot: 'result',
      when: withoutMapping,
      render: ctx => `return new ${ctx.names.singularName}ForReadDto
{
${initializerLines(ctx, 'entity')}
};`,
    },

    {
      slot: 'dtoSummary',
      when: usesDocs,
      render: ({ names }) => docSummary(`Detail shape returned by Get${names.singularName}ByIdQuery.`),
    },
    ...dtoProperties,
  ],
});
