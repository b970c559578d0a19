import { OPERATIONS } from '../../types';
import { createTemplate } from '../createTemplate';
import { TemplateFragment } from '../templateTypes';
import { PERMISSION_ACTION, docSummary, planHas, usesDocs } from '../templateHelpers';

const constants: TemplateFragment[] = OPERATIONS.map(op => ({
  slot: 'constants',
  when: planHas(op),
  render: ({ names }) => `public const string ${PERMISSION_ACTION[op]} = "Permissions.${names.pluralName}.${PERMISSION_ACTION[op]}";`,
}));

const all: TemplateFragment[] = OPERATIONS.map(op => ({
  slot: 'all',
  when: planHas(op),
  render: () => PERMISSION_ACTION[op],
}));

export const accessControlTemplate = createTemplate({
  kind: 'access-control',
  slots: { summary: 'lines', constants: 'lines', all: 'list' },
  body: ({ names: { pluralName: P } }) => `namespace Domain.PermissionsConstants;

{{slot:summary}}
public static class ${P}Permissions
{
    {{slot:constants}}

    public static readonly string[] All =
    [
        {{slot:all}}
    ];
}
`,
  fragments: [
    {
      slot: 'summary',
      when: usesDocs,
      render: ({ names }) => docSummary(`Permission names guarding ${names.pluralName} operations.`),
    },
    ...constants,
    ...all,
  ],
});
