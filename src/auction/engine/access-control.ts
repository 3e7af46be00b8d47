import { EngineError } from './errors';
import type { Role, RoleGrants } from './types';

/**
 * Role membership as explicit sets. No hierarchy: Admin does not imply the
 * other roles.
 */
export class AccessControl {
  private readonly members = new Map<Role, Set<string>>();

  constructor(grants: RoleGrants) {
    this.add('Admin', grants.admin);
    for (const actor of grants.auctioneers ?? []) this.add('Auctioneer', actor);
    for (const actor of grants.operators ?? []) this.add('Operator', actor);
    for (const actor of grants.maintainers ?? []) this.add('Maintainer', actor);
    for (const actor of grants.recovery ?? []) this.add('Recovery', actor);
  }

  hasRole(actor: string, role: Role): boolean {
    return this.members.get(role)?.has(actor) ?? false;
  }

  requireRole(actor: string, role: Role): void {
    if (!this.hasRole(actor, role)) {
      throw new EngineError('Unauthorized', `${actor} lacks role ${role}`);
    }
  }

  requireAnyRole(actor: string, roles: Role[]): void {
    if (!roles.some((role) => this.hasRole(actor, role))) {
      throw new EngineError(
        'Unauthorized',
        `${actor} lacks any of ${roles.join(', ')}`,
      );
    }
  }

  rolesOf(actor: string): Role[] {
    const roles: Role[] = [];
    for (const [role, actors] of this.members) {
      if (actors.has(actor)) roles.push(role);
    }
    return roles;
  }

  /** Returns false when the actor already held the role. */
  grant(role: Role, actor: string): boolean {
    if (this.hasRole(actor, role)) return false;
    this.add(role, actor);
    return true;
  }

  /** Returns false when the actor did not hold the role. */
  revoke(role: Role, actor: string): boolean {
    return this.members.get(role)?.delete(actor) ?? false;
  }

  private add(role: Role, actor: string): void {
    const actors = this.members.get(role) ?? new Set<string>();
    actors.add(actor);
    this.members.set(role, actors);
  }
}
