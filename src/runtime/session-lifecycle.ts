import { log } from "apify";
import { withTimeout } from "./admission-queue";
import { SessionError } from "./errors";

export interface SessionLifecycleConfig<TSession> {
  name: string;
  maxUses: number;
  open: () => Promise<TSession>;
  close: (session: TSession) => Promise<void>;
}

export interface SessionLifecycleStats {
  name: string;
  opened: number;
  closed: number;
  restarts: number;
  openFailures: number;
  closeFailures: number;
  uses: number;
  active: boolean;
  draining: number;
}

interface SessionSlot<TSession> {
  session: TSession;
  generation: number;
  uses: number;
  inFlight: number;
  retired: boolean;
  closed: boolean;
  drained: Array<() => void>;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Lazily opens one expensive session and shares it across uses. After
 * `maxUses` admissions the session is retired: new uses get a fresh one and
 * the old one closes as soon as its in-flight uses finish. Failures to open
 * or close never escape to callers other than the one that needed the session.
 */
export class SessionLifecycle<TSession> {
  private readonly config: SessionLifecycleConfig<TSession>;
  private current: SessionSlot<TSession> | null = null;
  private opening: Promise<SessionSlot<TSession>> | null = null;
  private readonly draining = new Set<SessionSlot<TSession>>();
  private generation = 0;
  private shuttingDown = false;
  private counters = { opened: 0, closed: 0, restarts: 0, openFailures: 0, closeFailures: 0, uses: 0 };

  public constructor(config: SessionLifecycleConfig<TSession>) {
    this.config = config;
  }

  public getStats(): SessionLifecycleStats {
    return {
      name: this.config.name,
      ...this.counters,
      active: this.current !== null,
      draining: this.draining.size,
    };
  }

  public async use<T>(fn: (session: TSession) => Promise<T>): Promise<T> {
    const slot = await this.acquireSlot();
    slot.uses += 1;
    slot.inFlight += 1;
    this.counters.uses += 1;
    if (slot.uses >= this.config.maxUses && this.current === slot) {
      this.retire(slot, "max uses reached");
      this.counters.restarts += 1;
    }

    try {
      return await fn(slot.session);
    } catch (error) {
      if (error instanceof SessionError && this.current === slot) {
        this.retire(slot, "session failure");
      }
      throw error;
    } finally {
      slot.inFlight -= 1;
      if (slot.inFlight === 0) {
        for (const resolve of slot.drained.splice(0)) resolve();
        if (slot.retired) await this.closeSlot(slot);
      }
    }
  }

  /** Stops admitting uses, waits for in-flight ones up to `drainTimeoutMs`, then closes everything. */
  public async shutdown(drainTimeoutMs: number): Promise<void> {
    this.shuttingDown = true;

    if (this.opening) {
      try {
        await this.opening;
      } catch (error) {
        log.debug("Session open was still pending at shutdown and failed.", {
          session: this.config.name,
          error: errorMessage(error),
        });
      }
    }
    if (this.current) this.retire(this.current, "shutdown");

    const slots = [...this.draining];
    const pending = slots.filter((slot) => slot.inFlight > 0);
    if (pending.length > 0) {
      try {
        await withTimeout(
          Promise.all(pending.map((slot) => new Promise<void>((resolve) => slot.drained.push(resolve)))),
          drainTimeoutMs,
          () => new SessionError("Session uses did not drain before shutdown.", { drainTimeoutMs }),
        );
      } catch (error) {
        log.warning("Closing session with uses still in flight.", {
          session: this.config.name,
          error: errorMessage(error),
        });
      }
    }

    await Promise.all(slots.map(async (slot) => this.closeSlot(slot)));
  }

  private async acquireSlot(): Promise<SessionSlot<TSession>> {
    if (this.shuttingDown) {
      throw new SessionError("Session lifecycle is shut down.", { session: this.config.name });
    }
    if (this.current) return this.current;
    if (!this.opening) {
      this.opening = this.openSlot().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async openSlot(): Promise<SessionSlot<TSession>> {
    let session: TSession;
    try {
      session = await this.config.open();
    } catch (error) {
      this.counters.openFailures += 1;
      log.warning("Session failed to open; the next use will try again.", {
        session: this.config.name,
        error: errorMessage(error),
      });
      throw error instanceof SessionError
        ? error
        : new SessionError("Session failed to open.", { session: this.config.name, error: errorMessage(error) });
    }

    this.generation += 1;
    this.counters.opened += 1;
    const slot: SessionSlot<TSession> = {
      session,
      generation: this.generation,
      uses: 0,
      inFlight: 0,
      retired: false,
      closed: false,
      drained: [],
    };
    if (this.shuttingDown) {
      this.draining.add(slot);
      slot.retired = true;
    } else {
      this.current = slot;
    }
    log.debug("Session opened.", { session: this.config.name, generation: slot.generation });
    return slot;
  }

  private retire(slot: SessionSlot<TSession>, reason: string): void {
    slot.retired = true;
    if (this.current === slot) this.current = null;
    this.draining.add(slot);
    log.debug("Session retired.", {
      session: this.config.name,
      generation: slot.generation,
      uses: slot.uses,
      reason,
    });
  }

  private async closeSlot(slot: SessionSlot<TSession>): Promise<void> {
    if (slot.closed) return;
    slot.closed = true;
    this.draining.delete(slot);
    try {
      await this.config.close(slot.session);
      this.counters.closed += 1;
    } catch (error) {
      this.counters.closeFailures += 1;
      log.warning("Session failed to close cleanly; discarding it.", {
        session: this.config.name,
        generation: slot.generation,
        error: errorMessage(error),
      });
    }
  }
}
