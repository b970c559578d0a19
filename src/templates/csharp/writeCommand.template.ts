import { createTemplate } from '../createTemplate';
import { TemplateContext } from '../templateTypes';
import {
  COMMAND_HANDLER_PARAMETERS, EVENT_SUFFIX, PERMISSION_ACTION,
  allOf, docSummary, documented, isOperation, ownsDto, planHas,
  softDeletes, usesDocs, withEvents, withPermissions, writeOperationOf,
} from '../templateHelpers';

function resultType(ctx: TemplateContext): string {
  return writeOperationOf(ctx) === 'Create' ? 'Guid' : 'Unit';
}

function loadEntity({ names: { singularName: S, pluralName: P } }: TemplateContext): string {
  return `var entity = await dbContext.${P}
    .FirstOrDefaultAsync(x => x.Id == request.Id, cancellationToken)
    ?? throw new NotFoundException(nameof(${S}), request.Id);`;
}

export const writeCommandTemplate = createTemplate({
  kind: 'write-command',
  slots: {
    usings: 'lines',
    summary: 'lines',
    attributes: 'lines',
    ctorParams: 'list',
    properties: 'lines',
    handlerParams: 'list',
    handle: 'blocks',
    types: 'blocks',
  },
  body: ctx => {
    const { singularName: S, pluralName: P } = ctx.names;
    const command = `${writeOperationOf(ctx)}${S}Command`;
    const result = resultType(ctx);
    return `{{slot:usings}}

namespace Application.${P}.Commands.${writeOperationOf(ctx)}${S};

{{slot:summary}}
{{slot:attributes}}
public sealed class ${command}({{slot:ctorParams}}) : ITenantCommand<${result}>
{
    {{slot:properties}}

    public sealed class Handler({{slot:handlerParams}}) : IRequestHandler<${command}, ${result}>
    {
        public async Task<${result}> Handle(${command} request, CancellationToken cancellationToken)
        {
            {{slot:handle}}
        }
    }
}

{{slot:types}}
`;
  },
  fragments: [
    // usings
    { slot: 'usings', render: () => 'using Application.Common;' },
    { slot: 'usings', when: isOperation('Update', 'Delete'), render: () => 'using Application.Common.Exceptions;' },
    {
      slot: 'usings',
      when: allOf(isOperation('Update'), planHas('Create')),
      render: ({ names }) => `using Application.${names.pluralName}.Commands.Create${names.singularName};`,
    },
    { slot: 'usings', when: withEvents, render: ({ names }) => `using Application.${names.pluralName}.Events;` },
    {
      slot: 'usings',
      when: ctx => withPermissions(ctx) || allOf(isOperation('Delete'), softDeletes)(ctx),
      render: () => 'using Application.Security;',
    },
    { slot: 'usings', render: ({ names }) => `using Domain.${names.pluralName};` },
    { slot: 'usings', when: withPermissions, render: () => 'using Domain.PermissionsConstants;' },
    { slot: 'usings', render: () => 'using MediatR;' },
    { slot: 'usings', when: isOperation('Update', 'Delete'), render: () => 'using Microsoft.EntityFrameworkCore;' },

    // header
    {
      slot: 'summary',
      when: usesDocs,
      render: ctx => docSummary(`${writeOperationOf(ctx)}s a ${ctx.names.singularName}.`),
    },
    {
      slot: 'attributes',
      when: withPermissions,
      render: ctx => `[Authorize(Permissions = [${ctx.names.pluralName}Permissions.${PERMISSION_ACTION[writeOperationOf(ctx)]}])]`,
    },

    // constructor and properties
    { slot: 'ctorParams', when: isOperation('Update', 'Delete'), render: () => 'Guid id' },
    { slot: 'ctorParams', when: isOperation('Create', 'Update'), render: ({ names }) => `${names.singularName}ForCreateUpdateDto dto` },
    { slot: 'properties', when: isOperation('Update', 'Delete'), render: () => 'public Guid Id { get; } = id;' },
    {
      slot: 'properties',
      when: isOperation('Create', 'Update'),
      render: ({ names }) => `public ${names.singularName}ForCreateUpdateDto Dto { get; } = dto;`,
    },
    ...COMMAND_HANDLER_PARAMETERS.map(p => ({
      slot: 'handlerParams',
      when: p.when,
      render: () => `${p.type} ${p.name}`,
    })),

    // Create
    {
      slot: 'handle',
      when: isOperation('Create'),
      render: ({ names: { singularName: S, pluralName: P } }) => `var entity = ${S}.Create(
    Guid.NewGuid(),
    request.Dto.Name);

dbContext.${P}.Add(entity);`,
    },

    // Update
    { slot: 'handle', when: isOperation('Update'), render: loadEntity },
    { slot: 'handle', when: isOperation('Update'), render: () => 'entity.Update(request.Dto.Name);' },

    // Delete
    { slot: 'handle', when: isOperation('Delete'), render: loadEntity },
    {
      slot: 'handle',
      when: allOf(isOperation('Delete'), softDeletes),
      render: () => 'entity.Delete(currentUserService.GetUserId());',
    },
    {
      slot: 'handle',
      when: ctx => isOperation('Delete')(ctx) && !softDeletes(ctx),
      render: ({ names }) => `dbContext.${names.pluralName}.Remove(entity);`,
    },

    // shared tail
    { slot: 'handle', render: () => 'await dbContext.SaveChangesAsync(cancellationToken);' },
    {
      slot: 'handle',
      when: withEvents,
      render: ctx => `await publisher.Publish(new ${ctx.names.singularName}${EVENT_SUFFIX[writeOperationOf(ctx)]}Event(entity.Id), cancellationToken);`,
    },
    {
      slot: 'handle',
      render: ctx => (writeOperationOf(ctx) === 'Create' ? 'return entity.Id;' : 'return Unit.Value;'),
    },

    // the create/update DTO lives beside its owning command
    {
      slot: 'types',
      when: ownsDto,
      render: ctx => documented(ctx, `Input shared by the create and update commands of ${ctx.names.singularName}.`,
        `public sealed record ${ctx.names.singularName}ForCreateUpdateDto
{
    public required string Name { get; init; }
}`),
    },
  ],
});
