// packages/reconciler/src/property-diff.ts
import { BadRequest, type JsonObject, type JsonValue, type Row } from '@ddlbridge/core';
import { isAbsent, renderValue, sameValue, type RenderKind } from './values';

export interface PropertySpec {
  name: string;                  // body / normalized-row field
  key?: string;                  // dialect keyword, defaults to NAME
  render: RenderKind;
  immutable?: boolean;           // set at creation only
  createOnly?: boolean;          // not reported back; never diffed
  unsettable?: boolean;          // false: absence leaves the value alone
  compare?: (v: JsonValue) => JsonValue;
}

export type DiffOutcome =
  | { kind: 'unchanged' }
  | { kind: 'set'; value: JsonValue }
  | { kind: 'unset' }
  | { kind: 'immutable'; current: JsonValue; desired: JsonValue };

export const keyOf = (spec: PropertySpec) => spec.key ?? spec.name.toUpperCase();

export function diffProperty(
  spec: PropertySpec,
  current: JsonValue | undefined,
  desired: JsonValue | undefined
): DiffOutcome {
  if (spec.createOnly) return { kind: 'unchanged' };
  const canon = spec.compare ?? ((v: JsonValue) => v);
  const cur = isAbsent(current) ? null : canon(current);
  const des = desired === undefined ? undefined : isAbsent(desired) ? null : canon(desired);

  if (spec.immutable) {
    if (des === undefined || sameValue(cur, des)) return { kind: 'unchanged' };
    return { kind: 'immutable', current: current ?? null, desired: desired ?? null };
  }
  if (isAbsent(des)) {
    if (spec.unsettable === false || isAbsent(cur)) return { kind: 'unchanged' };
    return { kind: 'unset' };
  }
  if (sameValue(cur, des)) return { kind: 'unchanged' };
  return { kind: 'set', value: desired ?? null };
}

export interface PropertyChanges {
  set: string[];                 // rendered `KEY = value`
  unset: string[];               // keys
  outcomes: Map<string, DiffOutcome>;
}

/**
 * Diff every declared property; any immutable violation aborts with
 * BadRequest before a statement exists.
 */
export function diffProperties(
  specs: readonly PropertySpec[],
  current: Row,
  desired: JsonObject,
  what: string
): PropertyChanges {
  const outcomes = new Map<string, DiffOutcome>();
  const violations: string[] = [];
  const set: string[] = [];
  const unset: string[] = [];

  for (const spec of specs) {
    const outcome = diffProperty(spec, current[spec.name], desired[spec.name]);
    outcomes.set(spec.name, outcome);
    if (outcome.kind === 'immutable') violations.push(spec.name);
    else if (outcome.kind === 'unset') unset.push(keyOf(spec));
    else if (outcome.kind === 'set') set.push(`${keyOf(spec)} = ${renderValue(spec.render, outcome.value)}`);
  }

  if (violations.length) {
    throw new BadRequest(`Cannot change immutable properties of ${what}: ${violations.join(', ')}`, {
      properties: violations,
    });
  }
  return { set, unset, outcomes };
}

export function renderAssignments(specs: readonly PropertySpec[], values: JsonObject): string[] {
  const out: string[] = [];
  for (const spec of specs) {
    const v = values[spec.name];
    if (!isAbsent(v)) out.push(`${keyOf(spec)} = ${renderValue(spec.render, v)}`);
  }
  return out;
}
