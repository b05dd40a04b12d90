// packages/core/src/create-mode.ts
import { BadRequest } from './errors';
import type { CreateMode } from './types';

// lower-cased alias -> canonical mode, built once
const CREATE_MODES: ReadonlyMap<string, CreateMode> = new Map<string, CreateMode>([
  ['errorifexists', 'errorIfExists'],
  ['ifnotexists', 'ifNotExists'],
  ['orreplace', 'orReplace'],
]);

export function parseCreateMode(raw: string | undefined): CreateMode {
  if (raw === undefined || raw === '') return 'errorIfExists';
  const mode = CREATE_MODES.get(raw.toLowerCase());
  if (!mode) {
    throw new BadRequest(
      `Unsupported createMode '${raw}'; expected one of errorIfExists, ifNotExists, orReplace`
    );
  }
  return mode;
}

// DELETE honours createMode=ifExists as well as ifExists=true
export function parseIfExists(query: Readonly<Record<string, string>>): boolean {
  if ((query.createMode ?? '').toLowerCase() === 'ifexists') return true;
  return (query.ifExists ?? '').toLowerCase() === 'true';
}

export function parseFlag(value: string | undefined): boolean {
  return (value ?? '').toLowerCase() === 'true';
}
