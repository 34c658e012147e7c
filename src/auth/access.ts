import type { UserRegistry } from "../users/registry.js";

export interface AccessPolicyOptions {
  admins: string[];
  /** Empty means everyone may talk to the bot. */
  allowedUsers: string[];
}

export type AccessDecision = "allowed" | "not_allowlisted" | "banned";

export class AccessPolicy {
  private readonly admins: Set<string>;
  private readonly allowed: Set<string>;

  constructor(
    options: AccessPolicyOptions,
    private readonly registry: Pick<UserRegistry, "getUser">,
  ) {
    this.admins = new Set(options.admins);
    this.allowed = new Set(options.allowedUsers);
  }

  isAdmin(userId: string): boolean {
    return this.admins.has(userId);
  }

  async check(userId: string): Promise<AccessDecision> {
    if (this.isAdmin(userId)) return "allowed";
    if (this.allowed.size > 0 && !this.allowed.has(userId)) return "not_allowlisted";
    const user = await this.registry.getUser(userId);
    return user?.status === "banned" ? "banned" : "allowed";
  }
}
