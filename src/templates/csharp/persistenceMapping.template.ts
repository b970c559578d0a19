import { createTemplate } from '../createTemplate';
import { docSummary, softDeletes, tierWith, usesDocs } from '../templateHelpers';

export const persistenceMappingTemplate = createTemplate({
  kind: 'persistence-mapping',
  slots: { summary: 'lines', configuration: 'blocks' },
  body: ({ names: { singularName: S, pluralName: P } }) => `using Domain.${P};
using Microsoft.EntityFrameworkCore;
using Microsoft.EntityFrameworkCore.Metadata.Builders;

namespace Persistence.Configurations.Tenants.${P};

{{slot:summary}}
public sealed class ${S}EntityConfiguration : IEntityTypeConfiguration<${S}>
{
    public void Configure(EntityTypeBuilder<${S}> builder)
    {
        {{slot:configuration}}
    }
}
`,
  fragments: [
    {
      slot: 'summary',
      when: usesDocs,
      render: ({ names }) => docSummary(`EF Core mapping for ${names.singularName}.`),
    },
    {
      slot: 'configuration',
      render: ({ names }) => `builder.ToTable("${names.pluralName}");

builder.HasKey(x => x.Id);`,
    },
    {
      slot: 'configuration',
      render: () => `builder.Property(x => x.Name)
    .IsRequired()
    .HasMaxLength(256);

builder.HasIndex(x => x.Name);`,
    },
    {
      slot: 'configuration',
      when: tierWith('creation-audit'),
      render: () => `builder.Property(x => x.CreatedAt)
    .IsRequired();
builder.Property(x => x.CreatedBy)
    .HasMaxLength(256);`,
    },
    {
      slot: 'configuration',
      when: tierWith('modification-audit'),
      render: () => `builder.Property(x => x.UpdatedAt);
builder.Property(x => x.UpdatedBy)
    .HasMaxLength(256);`,
    },
    {
      slot: 'configuration',
      when: tierWith('deletion-audit'),
      render: () => `builder.Property(x => x.DeletedAt);
builder.Property(x => x.DeletedByUserId);`,
    },
    {
      slot: 'configuration',
      when: softDeletes,
      render: () => 'builder.HasQueryFilter(x => x.DeletedAt == null);',
    },
  ],
});
