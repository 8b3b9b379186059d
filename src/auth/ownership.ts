/**
 * Ownership-based access control
 *
 * A resource's recorded owner alone may mutate it. Reads never consult the
 * guard; update and delete paths call it before touching storage.
 */

import type { Identity, OwnedResource } from "../types";
import { PermissionDeniedError } from "../api/errors";
import { ctxLogger } from "../api/request-context";

export type OwnershipDecision = "Allow" | "Deny";

export type MutatingAction = "update" | "delete";

export function check(identity: Identity, resource: OwnedResource): OwnershipDecision {
  return identity.userId === resource.ownerId ? "Allow" : "Deny";
}

/**
 * Throw PermissionDeniedError unless the identity owns the resource.
 * A denial is always reported as such, never as NotFound.
 */
export function assertOwnership(
  identity: Identity,
  resource: OwnedResource,
  action: MutatingAction,
  resourceType: string,
  resourceId: number,
  message?: string
): void {
  if (check(identity, resource) === "Allow") return;

  ctxLogger.warn("Ownership check denied", {
    action,
    resourceType,
    resourceId,
    ownerId: resource.ownerId,
  });
  throw new PermissionDeniedError(action, resourceType, resourceId, message);
}
