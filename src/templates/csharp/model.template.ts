import { createTemplate } from '../createTemplate';
import { baseEntityType, docSummary, documented, softDeletes, usesDocs } from '../templateHelpers';

export const modelTemplate = createTemplate({
  kind: 'model',
  slots: { usings: 'lines', summary: 'lines', members: 'blocks' },
  body: ({ names: { singularName: S, pluralName: P }, plan }) => `{{slot:usings}}

namespace Domain.${P};

{{slot:summary}}
public sealed class ${S} : ${baseEntityType(plan.entityTier)}
{
    {{slot:members}}
}
`,
  fragments: [
    { slot: 'usings', render: () => 'using Domain.Common;' },
    {
      slot: 'summary',
      when: usesDocs,
      render: ({ names }) => docSummary(`Represents the ${names.singularName} aggregate.`),
    },
    {
      slot: 'members',
      render: ctx => documented(ctx, `Display name of the ${ctx.names.singularName}.`,
        'public string Name { get; private set; } = string.Empty;'),
    },
    {
      slot: 'members',
      render: ({ names: { singularName: S } }) => `private ${S}(Guid id) : base(id)
{
}`,
    },
    {
      slot: 'members',
      render: ctx => documented(ctx, `Creates a new ${ctx.names.singularName}.`,
        `public static ${ctx.names.singularName} Create(Guid id, string name)
{
    EnsureValidName(name);

    return new ${ctx.names.singularName}(id)
    {
        Name = name
    };
}`),
    },
    {
      slot: 'members',
      render: ctx => documented(ctx, `Updates the mutable state of the ${ctx.names.singularName}.`,
        `public void Update(string name)
{
    EnsureValidName(name);

    Name = name;
}`),
    },
    {
      slot: 'members',
      when: softDeletes,
      render: ctx => documented(ctx, `Marks the ${ctx.names.singularName} as deleted without removing it.`,
        `public override void Delete(Guid userId)
{
    DeletedAt = DateTimeProvider.Instance.UtcNow();
    DeletedByUserId = userId;
}`),
    },
    {
      slot: 'members',
      render: ({ names: { singularName: S } }) => `private static void EnsureValidName(string name)
{
    if (string.IsNullOrWhiteSpace(name))
    {
        throw new ArgumentException("${S} name cannot be empty", nameof(name));
    }
}`,
    },
  ],
});
