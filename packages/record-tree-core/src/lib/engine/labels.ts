import { type ChildResource, isRoutableType, ROUTABLE_RECORD_TYPES } from '../types/resources';

/** One-line summary used as the label of a child node. */
export function describeChild(
  record: ChildResource,
  routableTypes: readonly string[] = ROUTABLE_RECORD_TYPES,
): string {
  const type = record.type.toUpperCase();
  const suffix = isRoutableType(type, routableTypes)
    ? record.proxied
      ? '(proxied)'
      : '(dns only)'
    : `(ttl ${record.ttl})`;

  return `${type} ${record.name} → ${record.content} ${suffix}`;
}
