// packages/bridge/src/resources/image-repository.ts
import { ImageRepositoryBody, normalizeName, resolvedToIdentifier, type Row } from '@ddlbridge/core';
import { SCHEMA_SCOPED, type ResourceDescriptor } from '../descriptor';
import type { ResourceTranslator, TranslatorContext } from '../context';
import { normalizeRow, type RowShape } from '../normalize';
import { createPrefix, ifExistsClause, lookup } from './shared';

export const IMAGE_REPOSITORY: ResourceDescriptor = {
  kind: 'image-repository',
  label: 'image repository',
  segments: SCHEMA_SCOPED('image-repositories'),
  required: ['name'],
  properties: [],
};

const SHAPE: RowShape = {
  emptyAsNull: ['comment'],
  names: ['name', 'database_name', 'schema_name'],
};

// no create-or-alter: a repository has nothing to alter
export class ImageRepositoryTranslator implements ResourceTranslator {
  readonly descriptor = IMAGE_REPOSITORY;

  constructor(private readonly ctx: TranslatorContext) {}

  async list(): Promise<Row[]> {
    const rows = await this.ctx.run(`SHOW IMAGE REPOSITORIES ${this.ctx.like()}IN SCHEMA ${this.ctx.inSchema}`);
    return rows.map((r) => normalizeRow(r, SHAPE));
  }

  describe() {
    const { ctx } = this;
    return lookup(async () => {
      const rows = await ctx.run(`SHOW IMAGE REPOSITORIES LIKE ${ctx.likeName()} IN SCHEMA ${ctx.inSchema}`);
      const row = rows.find((r) => r.name !== null && resolvedToIdentifier(r.name) === ctx.name);
      return row ? normalizeRow(row, SHAPE) : undefined;
    });
  }

  async create() {
    const body = this.ctx.desired(ImageRepositoryBody);
    return this.ctx.mutate(
      `CREATE ${createPrefix(this.ctx.createMode(), 'IMAGE REPOSITORY')}${this.ctx.qualified(normalizeName(body.name))}`
    );
  }

  drop() {
    return this.ctx.mutate(`DROP IMAGE REPOSITORY ${ifExistsClause(this.ctx.ifExists())}${this.ctx.qualified()}`);
  }
}
