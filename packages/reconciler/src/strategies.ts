// packages/reconciler/src/strategies.ts
import { BadRequest } from '@ddlbridge/core';

// --------------------
// Ordered list (append-only), e.g. table columns
// --------------------
// current and desired entries may have different shapes (reported vs requested)
export type OrderedChange<C, D = C> =
  | { kind: 'modify'; index: number; current: C; desired: D }
  | { kind: 'append'; desired: D };

export interface OrderedListOptions<C, D = C> {
  /** true when the two entries differ materially; may throw for disallowed changes */
  differs(current: C, desired: D, index: number): boolean;
  what: string;
}

export function diffOrderedList<C, D = C>(
  current: readonly C[],
  desired: readonly D[],
  opts: OrderedListOptions<C, D>
): OrderedChange<C, D>[] {
  if (desired.length < current.length) {
    throw new BadRequest(
      `${opts.what} cannot be removed: ${current.length} present, ${desired.length} requested`
    );
  }
  const changes: OrderedChange<C, D>[] = [];
  current.forEach((cur, i) => {
    if (opts.differs(cur, desired[i], i)) changes.push({ kind: 'modify', index: i, current: cur, desired: desired[i] });
  });
  for (let i = current.length; i < desired.length; i++) changes.push({ kind: 'append', desired: desired[i] });
  return changes;
}

// --------------------
// Keyed set, e.g. primary/unique key constraints
// --------------------
export type KeyedChange<T> =
  | { kind: 'drop'; current: T }
  | { kind: 'rename'; current: T; desired: T }
  | { kind: 'add'; desired: T };

export interface KeyedSetOptions<T> {
  key(item: T): string;
  name(item: T): string | null | undefined;
  /** auto-assigned names count as "no explicit name" */
  isSystemName?(name: string): boolean;
  sameName?(a: string, b: string): boolean;
}

export function diffKeyedSet<T>(
  current: readonly T[],
  desired: readonly T[],
  opts: KeyedSetOptions<T>
): KeyedChange<T>[] {
  const cur = new Map(current.map((c) => [opts.key(c), c] as const));
  const des = new Map(desired.map((d) => [opts.key(d), d] as const));
  const same = opts.sameName ?? ((a: string, b: string) => a === b);
  const explicit = (n: string | null | undefined): n is string =>
    !!n && !(opts.isSystemName?.(n) ?? false);

  const drops: KeyedChange<T>[] = [];
  const renames: KeyedChange<T>[] = [];
  const adds: KeyedChange<T>[] = [];

  for (const [k, c] of cur) {
    const d = des.get(k);
    if (!d) {
      drops.push({ kind: 'drop', current: c });
      continue;
    }
    const wanted = opts.name(d);
    const existing = opts.name(c);
    if (explicit(wanted) && !(existing && same(existing, wanted))) {
      renames.push({ kind: 'rename', current: c, desired: d });
    }
  }
  for (const [k, d] of des) if (!cur.has(k)) adds.push({ kind: 'add', desired: d });

  // drops first so a replaced key can be re-added
  return [...drops, ...renames, ...adds];
}

// --------------------
// Dependency list, e.g. task predecessors
// --------------------
export interface DependencyChanges {
  remove: string[];
  add: string[];
}

export function diffDependencies(
  current: readonly string[],
  desired: readonly string[] | null | undefined,
  key: (name: string) => string
): DependencyChanges {
  if (!desired || desired.length === 0) return { remove: [...current], add: [] };
  const curKeys = new Set(current.map(key));
  const desKeys = new Set(desired.map(key));
  return {
    remove: current.filter((c) => !desKeys.has(key(c))),
    add: desired.filter((d) => !curKeys.has(key(d))),
  };
}
