import { createTemplate } from '../createTemplate';
import { TemplateContext } from '../templateTypes';
import { EVENT_SUFFIX, docSummary, tierWith, tierWithout, usesDocs, writeOperationOf } from '../templateHelpers';

function eventName(ctx: TemplateContext): string {
  return `${ctx.names.singularName}${EVENT_SUFFIX[writeOperationOf(ctx)]}Event`;
}

const audited = tierWith('creation-audit');
const unaudited = tierWithout('creation-audit');

export const eventTemplate = createTemplate({
  kind: 'event',
  slots: { usings: 'lines', summary: 'lines', handler: 'blocks' },
  body: ctx => {
    const { singularName: S, pluralName: P, camelName } = ctx.names;
    return `{{slot:usings}}

namespace Application.${P}.Events;

{{slot:summary}}
public sealed class ${eventName(ctx)}(Guid ${camelName}Id) : INotification
{
    public Guid ${S}Id { get; } = ${camelName}Id;

    {{slot:handler}}
}
`;
  },
  fragments: [
    { slot: 'usings', when: audited, render: () => 'using Application.Common;' },
    { slot: 'usings', when: audited, render: () => 'using Domain.AuditLogs;' },
    { slot: 'usings', render: () => 'using MediatR;' },
    { slot: 'usings', when: unaudited, render: () => 'using Microsoft.Extensions.Logging;' },

    {
      slot: 'summary',
      when: usesDocs,
      render: ctx => docSummary(`Published after a ${ctx.names.singularName} is ${EVENT_SUFFIX[writeOperationOf(ctx)].toLowerCase()}.`),
    },

    // audited tiers record the change in the audit log
    {
      slot: 'handler',
      when: audited,
      render: ctx => {
        const name = eventName(ctx);
        const { singularName: S } = ctx.names;
        const suffix = EVENT_SUFFIX[writeOperationOf(ctx)];
        return `public sealed class Handler(ITenantDbContext dbContext) : INotificationHandler<${name}>
{
    public async Task Handle(${name} notification, CancellationToken cancellationToken)
    {
        var auditLog = new AuditLog(Guid.NewGuid(), ActorType.User, "${S} ${suffix}", AuditLogEventType.${S}${suffix});
        auditLog.SetEntityId(notification.${S}Id);

        dbContext.AuditLogs.Add(auditLog);
        await dbContext.SaveChangesAsync(cancellationToken);
    }
}`;
      },
    },
    {
      slot: 'handler',
      when: unaudited,
      render: ctx => {
        const name = eventName(ctx);
        const { singularName: S } = ctx.names;
        const verb = EVENT_SUFFIX[writeOperationOf(ctx)].toLowerCase();
        return `public sealed class Handler(ILogger<${name}> logger) : INotificationHandler<${name}>
{
    public Task Handle(${name} notification, CancellationToken cancellationToken)
    {
        logger.LogInformation("${S} {${S}Id} ${verb}", notification.${S}Id);
        return Task.CompletedTask;
    }
}`;
      },
    },
  ],
});
