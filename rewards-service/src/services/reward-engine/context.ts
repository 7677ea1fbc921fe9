/**
 * Evaluation Context
 *
 * Per-call snapshot of the receiving user, the acting session and free-form
 * arguments. `store` is the merged session + user view used for condition
 * and awardee matching. Never persisted.
 */

import type { RewardUser, SessionInfo } from '../../types.js';

export class EvalContext {
  readonly store: Readonly<Record<string, unknown>>;
  private readonly userKeys: ReadonlySet<string>;
  private readonly sessionKeys: ReadonlySet<string>;

  constructor(
    readonly user: RewardUser,
    readonly session: SessionInfo,
    readonly args: Record<string, unknown> = {}
  ) {
    const sessionView: Record<string, unknown> = { ...session.extra, ...session };
    delete sessionView.extra;
    this.userKeys = new Set(Object.entries(user).filter(([, value]) => value !== undefined).map(([key]) => key));
    this.sessionKeys = new Set(Object.keys(sessionView));
    this.store = {
      ...sessionView,
      ...user,
      // Receiver's memberships win over the acting session's
      groups: user.groups,
      programs: user.programs,
      jobCode: user.jobCode,
    };
  }

  /**
   * Context for a system-triggered evaluation: the session is the user's own.
   */
  static forUser(user: RewardUser, args: Record<string, unknown> = {}): EvalContext {
    return new EvalContext(user, sessionFromUser(user), args);
  }

  get groups(): string[] {
    return this.user.groups;
  }

  get programs(): string[] {
    return this.user.programs;
  }

  get jobCode(): string | undefined {
    return this.user.jobCode;
  }

  /** True when the acting session belongs to someone other than the receiver */
  get hasGiver(): boolean {
    return this.session.userId !== this.user.userId;
  }

  /**
   * A condition key is present when the user or session carries it,
   * or it was passed as a non-null argument.
   */
  hasKey(key: string): boolean {
    if (this.userKeys.has(key) || this.sessionKeys.has(key)) return true;
    const arg = this.args[key];
    return arg !== undefined && arg !== null;
  }
}

export function sessionFromUser(user: RewardUser): SessionInfo {
  return {
    userId: user.userId,
    email: user.email,
    displayName: user.displayName,
    associateId: user.associateId,
    groups: user.groups,
    programs: user.programs,
    jobCode: user.jobCode,
  };
}
