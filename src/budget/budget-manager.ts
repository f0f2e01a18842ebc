import { getConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import type { AgentRole, WorkerRole } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import { Mutex } from "../utils/mutex.js";

const log = createLogger("budget");

export type BudgetDebit = {
  day: string;
  role: AgentRole | null;
  cost: number;
  recordedAt: number;
};

/** Durable record of debits, so the daily ceiling holds across processes. */
export interface BudgetLedger {
  dailyUsage(day: string): number;
  appendDebit(debit: BudgetDebit): void | Promise<void>;
}

export type BudgetCheck = {
  canProceed: boolean;
  sessionPctUsed: number;
  dailyPctUsed: number;
  warn: boolean;
};

export type RoleShare = {
  /** Share of the batch total, normalised over the roles in the batch. */
  percent: number;
  allocated: number;
  spent: number;
  /** False once the role has no pending or running task left in the batch. */
  active: boolean;
};

export type BudgetSnapshot = {
  sessionLimit: number;
  dailyLimit: number;
  sessionUsed: number;
  dailyUsed: number;
  day: string;
  batchTotal: number;
  shares: Partial<Record<WorkerRole, RoleShare>>;
};

/** Budget held for an agent call that has not been debited yet. */
export type Reservation = { readonly cost: number };

export type BudgetManagerOptions = {
  sessionLimit?: number;
  dailyLimit?: number;
  warnThreshold?: number;
  charsPerToken?: number;
  roleAllocation?: Record<WorkerRole, number>;
  ledger?: BudgetLedger;
  sessionUsed?: number;
  dailyUsed?: number;
  now?: () => Date;
};

export type RestoreOptions = Omit<BudgetManagerOptions, "sessionLimit" | "dailyLimit" | "sessionUsed" | "dailyUsed">;

function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function isWorkerRole(role: AgentRole): role is WorkerRole {
  return role !== "orchestrator";
}

/**
 * Session and daily token accounting for one orchestration run, plus the
 * per-role split of the current batch. Mutations go through a single mutex
 * because task completions debit it concurrently.
 */
export class BudgetManager {
  readonly sessionLimit: number;
  readonly dailyLimit: number;

  private warnThreshold: number;
  private charsPerToken: number;
  private roleAllocation: Record<WorkerRole, number>;
  private ledger?: BudgetLedger;
  private now: () => Date;
  private mutex = new Mutex();

  private sessionUsed: number;
  private dailyUsed: number;
  private day: string;
  private batchTotal = 0;
  private shares = new Map<WorkerRole, RoleShare>();
  private held = new Set<Reservation>();
  private reservedTotal = 0;

  constructor(opts: BudgetManagerOptions = {}) {
    const cfg = getConfig().budget;
    this.sessionLimit = opts.sessionLimit ?? cfg.sessionLimit;
    this.dailyLimit = opts.dailyLimit ?? cfg.dailyLimit;
    this.warnThreshold = opts.warnThreshold ?? cfg.warnThreshold;
    this.charsPerToken = opts.charsPerToken ?? cfg.charsPerToken;
    this.roleAllocation = { ...(opts.roleAllocation ?? cfg.roleAllocation) };
    this.ledger = opts.ledger;
    this.now = opts.now ?? (() => new Date());
    this.day = dayKey(this.now());
    this.sessionUsed = opts.sessionUsed ?? 0;
    this.dailyUsed = opts.dailyUsed ?? this.ledger?.dailyUsage(this.day) ?? 0;
  }

  /** Rebuild counters from a persisted snapshot. Batch shares are not carried over. */
  static restore(snapshot: BudgetSnapshot, opts: RestoreOptions = {}): BudgetManager {
    const today = dayKey((opts.now ?? (() => new Date()))());
    return new BudgetManager({
      ...opts,
      sessionLimit: snapshot.sessionLimit,
      dailyLimit: snapshot.dailyLimit,
      sessionUsed: snapshot.sessionUsed,
      // The ledger already holds this run's debits; without one, trust the snapshot for the same day.
      dailyUsed: opts.ledger ? undefined : snapshot.day === today ? snapshot.dailyUsed : 0,
    });
  }

  /** Approximate token count: one token per `charsPerToken` characters. */
  estimate(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }

  /** Advisory: open reservations count as spent, but nothing is held. */
  check(cost: number): BudgetCheck {
    this.rollDay();
    return {
      canProceed: cost <= this.available(),
      sessionPctUsed: (this.sessionUsed / this.sessionLimit) * 100,
      dailyPctUsed: (this.dailyUsed / this.dailyLimit) * 100,
      warn: this.sessionUsed > this.sessionLimit * this.warnThreshold,
    };
  }

  /**
   * Hold `cost` for a call about to be made, or return undefined when it
   * does not fit in what is left after debits and other holds. Concurrent
   * callers are serialized, so the holds never add up past the limits.
   */
  async reserve(cost: number): Promise<Reservation | undefined> {
    return this.mutex.runExclusive(() => {
      this.rollDay();
      if (cost > this.available()) return undefined;
      const hold: Reservation = { cost };
      this.held.add(hold);
      this.reservedTotal += cost;
      return hold;
    });
  }

  /** Give a hold back without debiting anything. */
  async release(hold: Reservation): Promise<void> {
    await this.mutex.runExclusive(() => this.drop(hold));
  }

  /**
   * Debit both counters, and the role's batch share when one is allocated.
   * A hold passed along is settled by the same debit.
   */
  async record(cost: number, role?: AgentRole, hold?: Reservation): Promise<void> {
    if (!Number.isFinite(cost) || cost < 0) {
      throw new ValidationError("VALIDATION_FAILED", `Budget debit must be a non-negative number (got ${cost})`);
    }
    await this.mutex.runExclusive(async () => {
      if (hold) this.drop(hold);
      this.rollDay();
      this.sessionUsed += cost;
      this.dailyUsed += cost;
      if (role && isWorkerRole(role)) {
        const share = this.shares.get(role);
        if (share) share.spent += cost;
      }
      if (!this.ledger) return;
      try {
        await this.ledger.appendDebit({ day: this.day, role: role ?? null, cost, recordedAt: this.now().getTime() });
      } catch (err) {
        // In-memory counters stay authoritative for this run.
        log.error("Failed to persist budget debit", { cost, role, error: String(err) });
      }
    });
  }

  /**
   * Split the batch total (what is left of the tighter limit) across the
   * worker roles present, normalising their configured percentages to 100.
   */
  async allocate(roles: Iterable<AgentRole>): Promise<Partial<Record<WorkerRole, number>>> {
    return this.mutex.runExclusive(() => {
      this.rollDay();
      const present = [...new Set(roles)].filter(isWorkerRole);
      const pctSum = present.reduce((sum, role) => sum + this.roleAllocation[role], 0);

      this.batchTotal = Math.max(0, Math.min(this.sessionRemaining(), this.dailyRemaining()));
      this.shares.clear();
      for (const role of present) {
        const percent = pctSum > 0 ? (this.roleAllocation[role] / pctSum) * 100 : 100 / present.length;
        this.shares.set(role, {
          percent,
          allocated: (this.batchTotal * percent) / 100,
          spent: 0,
          active: true,
        });
      }

      log.debug("Batch budget allocated", { batchTotal: this.batchTotal, roles: present });
      return this.allocations();
    });
  }

  /**
   * Hand a finished role's unused share to the roles still running, in
   * proportion to their percentages. The batch total is unchanged; with no
   * active role left the share stays where it is.
   */
  async reallocate(finishedRole: AgentRole, unusedAmount?: number): Promise<Partial<Record<WorkerRole, number>>> {
    return this.mutex.runExclusive(() => {
      const finished = isWorkerRole(finishedRole) ? this.shares.get(finishedRole) : undefined;
      if (!finished) return this.remainingShares();
      finished.active = false;

      const available = Math.max(0, finished.allocated - finished.spent);
      const unused = Math.min(available, Math.max(0, unusedAmount ?? available));
      const recipients = [...this.shares.values()].filter((s) => s.active);
      const pctSum = recipients.reduce((sum, s) => sum + s.percent, 0);

      if (unused === 0 || pctSum === 0) {
        return this.remainingShares();
      }

      finished.allocated -= unused;
      for (const share of recipients) {
        share.allocated += unused * (share.percent / pctSum);
      }
      log.debug("Reallocated unused share", { from: finishedRole, amount: unused, to: recipients.length });
      return this.remainingShares();
    });
  }

  /** Allocated minus spent, per role of the current batch. */
  remainingShares(): Partial<Record<WorkerRole, number>> {
    const out: Partial<Record<WorkerRole, number>> = {};
    for (const [role, share] of this.shares) out[role] = share.allocated - share.spent;
    return out;
  }

  /** What a new call may still spend: the tighter limit minus debits and open holds. */
  available(): number {
    return Math.min(this.sessionRemaining(), this.dailyRemaining()) - this.reservedTotal;
  }

  get reserved(): number {
    return this.reservedTotal;
  }

  sessionRemaining(): number {
    return this.sessionLimit - this.sessionUsed;
  }

  dailyRemaining(): number {
    this.rollDay();
    return this.dailyLimit - this.dailyUsed;
  }

  snapshot(): BudgetSnapshot {
    this.rollDay();
    const shares: Partial<Record<WorkerRole, RoleShare>> = {};
    for (const [role, share] of this.shares) shares[role] = { ...share };
    return {
      sessionLimit: this.sessionLimit,
      dailyLimit: this.dailyLimit,
      sessionUsed: this.sessionUsed,
      dailyUsed: this.dailyUsed,
      day: this.day,
      batchTotal: this.batchTotal,
      shares,
    };
  }

  private allocations(): Partial<Record<WorkerRole, number>> {
    const out: Partial<Record<WorkerRole, number>> = {};
    for (const [role, share] of this.shares) out[role] = share.allocated;
    return out;
  }

  private drop(hold: Reservation): void {
    if (this.held.delete(hold)) this.reservedTotal -= hold.cost;
  }

  private rollDay(): void {
    const today = dayKey(this.now());
    if (today === this.day) return;
    log.info("Daily budget window rolled over", { from: this.day, to: today });
    this.day = today;
    this.dailyUsed = this.ledger?.dailyUsage(today) ?? 0;
  }
}
