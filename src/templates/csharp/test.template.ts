import { DescriptorKind } from '../../types';
import { createTemplate } from '../createTemplate';
import { FragmentPredicate, TemplateContext } from '../templateTypes';
import {
  EVENT_SUFFIX, allOf, anyOf, commandHandlerParameters, dtoNamespace, dtoOwner,
  isOperation, softDeletes, withEvents, writeOperationOf,
} from '../templateHelpers';

function subjectName(ctx: TemplateContext): string {
  return ctx.descriptor.subjectOf?.logicalName ?? ctx.descriptor.logicalName.replace(/Tests$/, '');
}

function subjectIs(...kinds: DescriptorKind[]): FragmentPredicate {
  return ctx => ctx.descriptor.subjectOf !== undefined && kinds.includes(ctx.descriptor.subjectOf.kind);
}

const handlerSubject = subjectIs('write-command', 'list-query', 'by-id-query');
const commandSubject = subjectIs('write-command');
const validatorSubject = subjectIs('write-validator');
const throwsNotFound: FragmentPredicate = anyOf(
  allOf(commandSubject, isOperation('Update', 'Delete')),
  subjectIs('by-id-query'),
);
const needsSeed: FragmentPredicate = anyOf(
  allOf(commandSubject, isOperation('Update', 'Delete')),
  subjectIs('list-query', 'by-id-query'),
);
const softDeleteSubject = allOf(commandSubject, isOperation('Delete'), softDeletes);
const publishingSubject = allOf(commandSubject, withEvents);
/** Update subjects whose DTO is declared by the Create command. */
const borrowsDto: FragmentPredicate = allOf(
  subjectIs('write-command', 'write-validator'),
  isOperation('Update'),
  ctx => dtoOwner(ctx) === 'Create',
);

function handlerArguments(ctx: TemplateContext): string {
  if (!commandSubject(ctx)) return '_dbContext';
  return commandHandlerParameters(ctx).map(p => `_${p.name}`).join(', ');
}

function fact(name: string, body: string, isAsync = true): string {
  const signature = isAsync ? `public async Task ${name}()` : `public void ${name}()`;
  return `[Fact]
${signature}
{
${body.split('\n').map(l => (l.length > 0 ? `    ${l}` : l)).join('\n')}
}`;
}

export const testTemplate = createTemplate({
  kind: 'test',
  slots: { usings: 'lines', base: 'lines', fields: 'lines', constructor: 'lines', facts: 'blocks' },
  body: ctx => {
    const folder = ctx.descriptor.subjectOf?.category === 'WriteOperation' ? 'Commands' : 'Queries';
    return `{{slot:usings}}

namespace ApplicationTests.${ctx.names.pluralName}.${folder};

public class ${subjectName(ctx)}Tests{{slot:base}}
{
    {{slot:fields}}

    {{slot:constructor}}

    {{slot:facts}}
}
`;
  },
  fragments: [
    // usings
    { slot: 'usings', when: handlerSubject, render: () => 'using Application.Common;' },
    { slot: 'usings', when: throwsNotFound, render: () => 'using Application.Common.Exceptions;' },
    { slot: 'usings', when: borrowsDto, render: ctx => `using ${dtoNamespace(ctx) ?? ''};` },
    {
      slot: 'usings',
      when: subjectIs('write-command', 'write-validator'),
      render: ctx => `using Application.${ctx.names.pluralName}.Commands.${writeOperationOf(ctx)}${ctx.names.singularName};`,
    },
    { slot: 'usings', when: publishingSubject, render: ({ names }) => `using Application.${names.pluralName}.Events;` },
    {
      slot: 'usings',
      when: subjectIs('list-query'),
      render: ({ names }) => `using Application.${names.pluralName}.Queries.Get${names.pluralName};`,
    },
    {
      slot: 'usings',
      when: subjectIs('by-id-query'),
      render: ({ names }) => `using Application.${names.pluralName}.Queries.Get${names.singularName}ById;`,
    },
    { slot: 'usings', when: softDeleteSubject, render: () => 'using Application.Security;' },
    { slot: 'usings', when: handlerSubject, render: ({ names }) => `using Domain.${names.pluralName};` },
    { slot: 'usings', when: handlerSubject, render: () => 'using FluentAssertions;' },
    { slot: 'usings', when: validatorSubject, render: () => 'using FluentValidation.TestHelper;' },
    { slot: 'usings', when: publishingSubject, render: () => 'using MediatR;' },
    { slot: 'usings', when: handlerSubject, render: () => 'using Microsoft.EntityFrameworkCore;' },
    { slot: 'usings', when: anyOf(publishingSubject, softDeleteSubject), render: () => 'using NSubstitute;' },
    { slot: 'usings', render: () => 'using Xunit;' },

    { slot: 'base', when: handlerSubject, render: () => ' : BaseTest' },

    // fields
    { slot: 'fields', when: softDeleteSubject, render: () => 'private static readonly Guid UserId = Guid.NewGuid();' },
    { slot: 'fields', when: handlerSubject, render: () => 'private readonly ITenantDbContext _dbContext;' },
    { slot: 'fields', when: publishingSubject, render: () => 'private readonly IPublisher _publisher = Substitute.For<IPublisher>();' },
    {
      slot: 'fields',
      when: softDeleteSubject,
      render: () => 'private readonly ICurrentUserService _currentUserService = Substitute.For<ICurrentUserService>();',
    },
    { slot: 'fields', when: handlerSubject, render: ctx => `private readonly ${subjectName(ctx)}.Handler _handler;` },
    { slot: 'fields', when: validatorSubject, render: ctx => `private readonly ${subjectName(ctx)} _validator = new();` },

    {
      slot: 'constructor',
      when: handlerSubject,
      render: ctx => {
        const lines = ['_dbContext = GetDbContext();'];
        if (softDeleteSubject(ctx)) lines.push('_currentUserService.GetUserId().Returns(UserId);');
        lines.push(`_handler = new ${subjectName(ctx)}.Handler(${handlerArguments(ctx)});`);
        return `public ${subjectName(ctx)}Tests()
{
${lines.map(l => `    ${l}`).join('\n')}
}`;
      },
    },

    // Create command
    {
      slot: 'facts',
      when: allOf(commandSubject, isOperation('Create')),
      render: ({ names: { singularName: S, pluralName: P } }) => fact(`Handle_Should_Create${S}`, `var command = new Create${S}Command(new ${S}ForCreateUpdateDto { Name = "Test ${S}" });

var id = await _handler.Handle(command, CancellationToken.None);

var created = await _dbContext.${P}.FirstOrDefaultAsync(x => x.Id == id);
created.Should().NotBeNull();
created!.Name.Should().Be("Test ${S}");`),
    },

    // Update command
    {
      slot: 'facts',
      when: allOf(commandSubject, isOperation('Update')),
      render: ({ names: { singularName: S, pluralName: P } }) => fact(`Handle_Should_Update${S}`, `var entity = await Seed${S}Async("Original ${S}");
var command = new Update${S}Command(entity.Id, new ${S}ForCreateUpdateDto { Name = "Updated ${S}" });

await _handler.Handle(command, CancellationToken.None);

var updated = await _dbContext.${P}.FirstAsync(x => x.Id == entity.Id);
updated.Name.Should().Be("Updated ${S}");`),
    },
    {
      slot: 'facts',
      when: allOf(commandSubject, isOperation('Update')),
      render: ({ names: { singularName: S } }) => fact(`Handle_Should_Throw_When${S}DoesNotExist`, `var command = new Update${S}Command(Guid.NewGuid(), new ${S}ForCreateUpdateDto { Name = "Missing ${S}" });

var act = () => _handler.Handle(command, CancellationToken.None);

await act.Should().ThrowAsync<NotFoundException>();`),
    },

    // Delete command
    {
      slot: 'facts',
      when: allOf(commandSubject, isOperation('Delete'), softDeletes),
      render: ({ names: { singularName: S, pluralName: P } }) => fact(`Handle_Should_SoftDelete${S}`, `var entity = await Seed${S}Async("Doomed ${S}");

await _handler.Handle(new Delete${S}Command(entity.Id), CancellationToken.None);

var deleted = await _dbContext.${P}.IgnoreQueryFilters().FirstAsync(x => x.Id == entity.Id);
deleted.DeletedAt.Should().NotBeNull();
deleted.DeletedByUserId.Should().Be(UserId);`),
    },
    {
      slot: 'facts',
      when: ctx => allOf(commandSubject, isOperation('Delete'))(ctx) && !softDeletes(ctx),
      render: ({ names: { singularName: S, pluralName: P } }) => fact(`Handle_Should_Remove${S}`, `var entity = await Seed${S}Async("Doomed ${S}");

await _handler.Handle(new Delete${S}Command(entity.Id), CancellationToken.None);

(await _dbContext.${P}.AnyAsync(x => x.Id == entity.Id)).Should().BeFalse();`),
    },
    {
      slot: 'facts',
      when: allOf(commandSubject, isOperation('Delete')),
      render: ({ names: { singularName: S } }) => fact(`Handle_Should_Throw_When${S}DoesNotExist`, `var act = () => _handler.Handle(new Delete${S}Command(Guid.NewGuid()), CancellationToken.None);

await act.Should().ThrowAsync<NotFoundException>();`),
    },

    // events
    {
      slot: 'facts',
      when: allOf(publishingSubject, isOperation('Create')),
      render: ({ names: { singularName: S } }) => fact(`Handle_Should_Publish${S}CreatedEvent`, `await _handler.Handle(new Create${S}Command(new ${S}ForCreateUpdateDto { Name = "Test ${S}" }), CancellationToken.None);

await _publisher.Received(1).Publish(Arg.Any<${S}CreatedEvent>(), Arg.Any<CancellationToken>());`),
    },
    {
      slot: 'facts',
      when: allOf(publishingSubject, isOperation('Update', 'Delete')),
      render: ctx => {
        const { singularName: S } = ctx.names;
        const op = writeOperationOf(ctx);
        const command = op === 'Update'
          ? `new Update${S}Command(entity.Id, new ${S}ForCreateUpdateDto { Name = "Updated ${S}" })`
          : `new Delete${S}Command(entity.Id)`;
        const event = `${S}${EVENT_SUFFIX[op]}Event`;
        return fact(`Handle_Should_Publish${event}`, `var entity = await Seed${S}Async("Test ${S}");

await _handler.Handle(${command}, CancellationToken.None);

await _publisher.Received(1).Publish(Arg.Any<${event}>(), Arg.Any<CancellationToken>());`);
      },
    },

    // queries
    {
      slot: 'facts',
      when: subjectIs('list-query'),
      render: ({ names: { singularName: S, pluralName: P } }) => fact(`Handle_Should_Return${P}`, `await Seed${S}Async("First ${S}");
await Seed${S}Async("Second ${S}");

var result = await _handler.Handle(new Get${P}Query(new ${S}ForRequestDto()), CancellationToken.None);

result.Items.Should().HaveCount(2);`),
    },
    {
      slot: 'facts',
      when: subjectIs('by-id-query'),
      render: ({ names: { singularName: S } }) => fact(`Handle_Should_Return${S}`, `var entity = await Seed${S}Async("Test ${S}");

var result = await _handler.Handle(new Get${S}ByIdQuery(entity.Id), CancellationToken.None);

result.Id.Should().Be(entity.Id);
result.Name.Should().Be("Test ${S}");`),
    },
    {
      slot: 'facts',
      when: subjectIs('by-id-query'),
      render: ({ names: { singularName: S } }) => fact(`Handle_Should_Throw_When${S}DoesNotExist`, `var act = () => _handler.Handle(new Get${S}ByIdQuery(Guid.NewGuid()), CancellationToken.None);

await act.Should().ThrowAsync<NotFoundException>();`),
    },

    // validators
    {
      slot: 'facts',
      when: allOf(validatorSubject, isOperation('Update', 'Delete')),
      render: ctx => {
        const { singularName: S } = ctx.names;
        const command = writeOperationOf(ctx) === 'Update'
          ? `new Update${S}Command(Guid.Empty, new ${S}ForCreateUpdateDto { Name = "Test ${S}" })`
          : `new Delete${S}Command(Guid.Empty)`;
        return fact('Should_HaveError_When_IdIsEmpty', `var result = _validator.TestValidate(${command});

result.ShouldHaveValidationErrorFor(x => x.Id);`, false);
      },
    },
    {
      slot: 'facts',
      when: allOf(validatorSubject, isOperation('Create', 'Update')),
      render: ctx => {
        const { singularName: S } = ctx.names;
        const dto = `new ${S}ForCreateUpdateDto { Name = string.Empty }`;
        const command = writeOperationOf(ctx) === 'Update'
          ? `new Update${S}Command(Guid.NewGuid(), ${dto})`
          : `new Create${S}Command(${dto})`;
        return fact('Should_HaveError_When_NameIsEmpty', `var result = _validator.TestValidate(${command});

result.ShouldHaveValidationErrorFor(x => x.Dto.Name);`, false);
      },
    },
    {
      slot: 'facts',
      when: validatorSubject,
      render: ctx => {
        const { singularName: S } = ctx.names;
        const dto = `new ${S}ForCreateUpdateDto { Name = "Test ${S}" }`;
        const commands = {
          Create: `new Create${S}Command(${dto})`,
          Update: `new Update${S}Command(Guid.NewGuid(), ${dto})`,
          Delete: `new Delete${S}Command(Guid.NewGuid())`,
        };
        return fact('Should_NotHaveErrors_When_CommandIsValid', `var result = _validator.TestValidate(${commands[writeOperationOf(ctx)]});

result.ShouldNotHaveAnyValidationErrors();`, false);
      },
    },

    {
      slot: 'facts',
      when: needsSeed,
      render: ({ names: { singularName: S, pluralName: P } }) => `private async Task<${S}> Seed${S}Async(string name)
{
    var entity = ${S}.Create(Guid.NewGuid(), name);
    _dbContext.${P}.Add(entity);
    await _dbContext.SaveChangesAsync(CancellationToken.None);
    return entity;
}`,
    },
  ],
});
