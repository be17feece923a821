import type { ReconcileRequest } from "../models/types.js";

export function objectKey(request: ReconcileRequest): string {
  return `${request.namespace}/${request.name}`;
}

/**
 * Split a `namespace/name` key; returns null for anything else
 */
export function parseObjectKey(key: string): ReconcileRequest | null {
  const parts = key.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return null;
  }
  return { namespace: parts[0], name: parts[1] };
}
