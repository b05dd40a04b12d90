// packages/bridge/src/resources/database.ts
import {
  AccountsBody,
  BadRequest,
  DatabaseBody,
  normalizeName,
  splitQualifiedName,
} from '@ddlbridge/core';
import type { ResourceDescriptor } from '../descriptor';
import type { Handler, TranslatorContext } from '../context';
import { CONTAINER_SHAPE, ContainerTranslator, containerProperties } from './container';
import { createPrefix } from './shared';

export const DATABASE: ResourceDescriptor = {
  kind: 'database',
  label: 'database',
  segments: ['api', 'v2', 'databases', ':name', ':sub'],
  subResources: ['replication', 'failover'],
  required: ['name'],
  properties: containerProperties(),
};

const KEEP = [
  'created_on', 'name', 'is_default', 'is_current', 'origin', 'owner',
  'comment', 'options', 'dropped_on', 'owner_role_type',
];

// ORG.ACCOUNT style names
const accountName = (a: string) => splitQualifiedName(a).map(normalizeName).join('.');

function replicationActions(ctx: TranslatorContext): Record<string, Handler> {
  const feature = () => {
    const sub = ctx.scope.subResource;
    if (!sub) throw new BadRequest("Specify 'replication' or 'failover' in the URL");
    return sub.toUpperCase();
  };
  const accounts = () => ctx.parse(AccountsBody).accounts.map(accountName);

  return {
    enable: () => {
      const list = accounts();
      if (!list.length) throw new BadRequest('At least one account is required');
      const ignore = ctx.flag('ignore_edition_check') ? ' IGNORE EDITION CHECK' : '';
      return ctx.mutate(`ALTER DATABASE ${ctx.name} ENABLE ${feature()} TO ACCOUNTS ${list.join(', ')}${ignore}`);
    },
    disable: () => {
      const list = accounts();
      const to = list.length ? ` TO ACCOUNTS ${list.join(', ')}` : '';
      return ctx.mutate(`ALTER DATABASE ${ctx.name} DISABLE ${feature()}${to}`);
    },
    refresh: () => ctx.mutate(`ALTER DATABASE ${ctx.name} REFRESH`),
    primary: () => ctx.mutate(`ALTER DATABASE ${ctx.name} PRIMARY`),
    from_share: () => {
      const share = ctx.query.share;
      if (!share) throw new BadRequest("Query parameter 'share' is required");
      return ctx.mutate(`CREATE ${createPrefix(ctx.createMode(), 'DATABASE')}${ctx.name} FROM SHARE ${accountName(share)}`);
    },
  };
}

export class DatabaseTranslator extends ContainerTranslator {
  constructor(ctx: TranslatorContext) {
    super(ctx, {
      descriptor: DATABASE,
      objectType: 'DATABASE',
      keep: KEEP,
      shape: CONTAINER_SHAPE,
      body: DatabaseBody,
      show: (c) => `SHOW DATABASES ${c.flag('history') ? 'HISTORY ' : ''}${c.like()}${c.showSuffix()}`,
      showOne: (c) => `SHOW DATABASES LIKE ${c.likeName()}`,
      extraActions: replicationActions,
    });
  }
}
