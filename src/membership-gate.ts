import type { Clock } from "./clock";
import type { EntryLedger, RecordEntryResult } from "./entry-ledger";
import { normalizeError, type Logger } from "./logger";
import type { MembershipStatus, UserProfile } from "./types";

export interface MembershipOracle {
  getMembershipStatus(chatId: number, userId: number): Promise<MembershipStatus>;
}

export type GateState = "requested" | "verifying" | "granted" | "denied" | "verification_failed";

export type GateOutcome =
  | { state: "granted"; status: MembershipStatus; result: RecordEntryResult }
  | { state: "denied"; status: MembershipStatus }
  | { state: "verification_failed"; error: string };

const IN_GROUP_STATUSES: ReadonlySet<MembershipStatus> = new Set(["member", "administrator", "creator"]);

export function isInGroup(status: MembershipStatus): boolean {
  return IN_GROUP_STATUSES.has(status);
}

type GateDeps = {
  requiredChatId: number;
  oracle: MembershipOracle;
  ledger: Pick<EntryLedger, "record">;
  clock: Clock;
  logger: Logger;
};

/**
 * Lets a user into the giveaway only while they are in the required chat.
 * Any error from the membership lookup is a refusal; a ledger failure after
 * a successful check is thrown to the caller.
 */
export class MembershipGate {
  private readonly deps: GateDeps;

  constructor(deps: GateDeps) {
    this.deps = deps;
  }

  async enter(user: UserProfile): Promise<GateOutcome> {
    const { requiredChatId, oracle, ledger, clock, logger } = this.deps;
    this.transition("requested", user.userId);

    this.transition("verifying", user.userId);
    let status: MembershipStatus;
    try {
      status = await oracle.getMembershipStatus(requiredChatId, user.userId);
    } catch (error) {
      const { message } = normalizeError(error);
      logger.warn("gate_verification_failed", { userId: user.userId, chatId: requiredChatId, error: message });
      return { state: "verification_failed", error: message };
    }

    if (!isInGroup(status)) {
      logger.info("gate_denied", { userId: user.userId, status });
      return { state: "denied", status };
    }

    const result = ledger.record(user, clock.now());
    logger.info("gate_granted", { userId: user.userId, status, created: result.created });
    return { state: "granted", status, result };
  }

  private transition(state: GateState, userId: number): void {
    this.deps.logger.debug(`gate_${state}`, { userId });
  }
}
