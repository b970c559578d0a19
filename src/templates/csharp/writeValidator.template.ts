import { createTemplate } from '../createTemplate';
import { docSummary, isOperation, usesDocs, writeOperationOf } from '../templateHelpers';

export const writeValidatorTemplate = createTemplate({
  kind: 'write-validator',
  slots: { summary: 'lines', rules: 'blocks' },
  body: ctx => {
    const { singularName: S, pluralName: P } = ctx.names;
    const command = `${writeOperationOf(ctx)}${S}Command`;
    return `using FluentValidation;

namespace Application.${P}.Commands.${writeOperationOf(ctx)}${S};

{{slot:summary}}
public sealed class ${command}Validator : AbstractValidator<${command}>
{
    public ${command}Validator()
    {
        {{slot:rules}}
    }
}
`;
  },
  fragments: [
    {
      slot: 'summary',
      when: usesDocs,
      render: ctx => docSummary(`Validates ${writeOperationOf(ctx)}${ctx.names.singularName}Command before it is handled.`),
    },
    {
      slot: 'rules',
      when: isOperation('Update', 'Delete'),
      render: () => `RuleFor(x => x.Id)
    .NotEmpty();`,
    },
    {
      slot: 'rules',
      when: isOperation('Create', 'Update'),
      render: () => `RuleFor(x => x.Dto.Name)
    .NotEmpty()
    .MaximumLength(256);`,
    },
  ],
});
