// packages/bridge/src/descriptor.ts
import {
  BadRequest,
  normalizeName,
  unqualifiedName,
  type NormalizedRequest,
  type ParentHandle,
  type ResourceKind,
} from '@ddlbridge/core';
import type { PropertySpec } from '@ddlbridge/reconciler';

// literal segment, or one of the named roles
export type SegmentRole = string | ':database' | ':schema' | ':name' | ':sub';

export interface ResourceDescriptor {
  kind: ResourceKind;
  label: string;                          // e.g. "compute pool"
  segments: readonly SegmentRole[];       // full path, starting at 'api'
  subResources?: readonly string[];
  required: readonly string[];
  properties: readonly PropertySpec[];    // diffable, in statement order
  unqualifiedBodyName?: boolean;          // body.name keeps only its last dotted part
}

/** Instance name a create body designates */
export function bodyName(d: ResourceDescriptor, name: string): string {
  return normalizeName(d.unqualifiedBodyName ? unqualifiedName(name) : name);
}

export interface PropertyLists {
  required: string[];
  optional: string[];
  immutable: string[];
}

export function propertyLists(d: ResourceDescriptor): PropertyLists {
  return {
    required: [...d.required],
    optional: d.properties.map((p) => p.name).filter((n) => !d.required.includes(n)),
    immutable: d.properties.filter((p) => p.immutable).map((p) => p.name),
  };
}

export interface Scope {
  kind: ResourceKind;
  parent: ParentHandle;
  isCollection: boolean;
  name?: string;                          // normalized instance name
  subResource?: string;
  action?: string;
  request: NormalizedRequest;
}

export const SCHEMA_SCOPED = (collection: string): SegmentRole[] =>
  ['api', 'v2', 'databases', ':database', 'schemas', ':schema', collection, ':name'];

export function parseScope(d: ResourceDescriptor, request: NormalizedRequest): Scope {
  const { path } = request;
  const nameAt = d.segments.indexOf(':name');
  if (path.length < nameAt || path.length > d.segments.length) {
    throw new BadRequest('Malformed Resource URL', { path: '/' + path.join('/') });
  }

  const scope: Scope = { kind: d.kind, parent: {}, isCollection: path.length === nameAt, request };
  path.forEach((seg, i) => {
    const role = d.segments[i];
    switch (role) {
      case ':database': scope.parent.database = normalizeName(seg); break;
      case ':schema': scope.parent.schema = normalizeName(seg); break;
      case ':name': scope.name = normalizeName(seg); break;
      case ':sub':
        if (!d.subResources?.includes(seg)) throw new BadRequest(`Unsupported sub-resource '${seg}' for ${d.label}`);
        scope.subResource = seg;
        break;
      default:
        if (seg !== role) throw new BadRequest('Malformed Resource URL', { path: '/' + path.join('/') });
    }
  });
  if (request.customAction) scope.action = request.customAction;

  // PUT on the collection targets body.name
  if (request.method === 'PUT' && scope.isCollection && typeof request.body.name === 'string') {
    scope.name = bodyName(d, request.body.name);
    scope.isCollection = false;
  }
  return scope;
}
