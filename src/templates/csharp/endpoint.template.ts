import { Operation, WRITE_OPERATIONS } from '../../types';
import { createTemplate } from '../createTemplate';
import { TemplateContext, TemplateFragment } from '../templateTypes';
import {
  PERMISSION_ACTION, docSummary, documented, planHas,
  usesDocs, withPermissions,
} from '../templateHelpers';

/** HTTP verb attribute, then the policy attribute when permissions are on. */
function attributes(ctx: TemplateContext, verb: string, operation: Operation): string {
  const lines = [verb];
  if (withPermissions(ctx)) {
    lines.push(`[Authorize(Policy = ${ctx.names.pluralName}Permissions.${PERMISSION_ACTION[operation]})]`);
  }
  return lines.join('\n');
}

const commandUsings: TemplateFragment[] = WRITE_OPERATIONS.map(op => ({
  slot: 'usings',
  when: planHas(op),
  render: ({ names }) => `using Application.${names.pluralName}.Commands.${op}${names.singularName};`,
}));

export const endpointTemplate = createTemplate({
  kind: 'endpoint',
  slots: { usings: 'lines', summary: 'lines', actions: 'blocks' },
  body: ({ names: { pluralName: P } }) => `{{slot:usings}}

namespace Api.Controllers;

{{slot:summary}}
[Route("[controller]")]
public sealed class ${P}Controller(ISender sender) : BaseController
{
    {{slot:actions}}
}
`,
  fragments: [
    ...commandUsings,
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
    { slot: 'usings', when: planHas('Read'), render: () => 'using Application.Pagination;' },
    { slot: 'usings', when: withPermissions, render: () => 'using Domain.PermissionsConstants;' },
    { slot: 'usings', render: () => 'using MediatR;' },
    { slot: 'usings', when: withPermissions, render: () => 'using Microsoft.AspNetCore.Authorization;' },
    { slot: 'usings', render: () => 'using Microsoft.AspNetCore.Mvc;' },

    {
      slot: 'summary',
      when: usesDocs,
      render: ({ names }) => docSummary(`HTTP endpoints for ${names.pluralName}.`),
    },

    {
      slot: 'actions',
      when: planHas('Read'),
      render: ctx => {
        const { singularName: S, pluralName: P } = ctx.names;
        return documented(ctx, `Lists ${P} one page at a time.`, `${attributes(ctx, '[HttpGet]', 'Read')}
public async Task<ActionResult<PaginatedList<${S}ForListDto>>> Get([FromQuery] ${S}ForRequestDto requestDto, CancellationToken cancellationToken)
{
    return Ok(await sender.Send(new Get${P}Query(requestDto), cancellationToken));
}`);
      },
    },
    {
      slot: 'actions',
      when: planHas('Read'),
      render: ctx => {
        const { singularName: S } = ctx.names;
        return documented(ctx, `Gets one ${S} by id.`, `${attributes(ctx, '[HttpGet("{id:guid}")]', 'Read')}
public async Task<ActionResult<${S}ForReadDto>> GetById(Guid id, CancellationToken cancellationToken)
{
    return Ok(await sender.Send(new Get${S}ByIdQuery(id), cancellationToken));
}`);
      },
    },
    {
      slot: 'actions',
      when: planHas('Create'),
      render: ctx => {
        const { singularName: S } = ctx.names;
        const reply = planHas('Read')(ctx)
          ? 'return CreatedAtAction(nameof(GetById), new { id }, id);'
          : 'return Ok(id);';
        return documented(ctx, `Creates a ${S} and returns its id.`, `${attributes(ctx, '[HttpPost]', 'Create')}
public async Task<ActionResult<Guid>> Post(${S}ForCreateUpdateDto requestDto, CancellationToken cancellationToken)
{
    var id = await sender.Send(new Create${S}Command(requestDto), cancellationToken);
    ${reply}
}`);
      },
    },
    {
      slot: 'actions',
      when: planHas('Update'),
      render: ctx => {
        const { singularName: S } = ctx.names;
        return documented(ctx, `Updates an existing ${S}.`, `${attributes(ctx, '[HttpPut("{id:guid}")]', 'Update')}
public async Task<IActionResult> Put(Guid id, ${S}ForCreateUpdateDto requestDto, CancellationToken cancellationToken)
{
    await sender.Send(new Update${S}Command(id, requestDto), cancellationToken);
    return NoContent();
}`);
      },
    },
    {
      slot: 'actions',
      when: planHas('Delete'),
      render: ctx => {
        const { singularName: S } = ctx.names;
        return documented(ctx, `Deletes a ${S}.`, `${attributes(ctx, '[HttpDelete("{id:guid}")]', 'Delete')}
public async Task<IActionResult> Delete(Guid id, CancellationToken cancellationToken)
{
    await sender.Send(new Delete${S}Command(id), cancellationToken);
    return NoContent();
}`);
      },
    },
  ],
});
