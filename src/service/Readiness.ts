import { LedgerService } from '../domain/types';

export interface ReadinessContext {
  caught_up: boolean;
  last_message_index: number | null;
  last_block_index: number | null;
  testnet: boolean;
}

export interface ReadinessSource {
  current(): ReadinessContext;
}

/**
 * Tracks whether the ledger daemon has caught up with the chain by polling
 * `get_running_info`. A failed poll marks the service not ready.
 */
export class ReadinessMonitor implements ReadinessSource {
  private state: ReadinessContext;
  private timer: NodeJS.Timeout | null = null;
  private pending: Promise<ReadinessContext> | null = null;

  constructor(
    private readonly ledger: LedgerService,
    private readonly pollMs: number,
    testnet: boolean
  ) {
    this.state = { caught_up: false, last_message_index: null, last_block_index: null, testnet };
  }

  public current(): ReadinessContext {
    return { ...this.state };
  }

  /** Polls the ledger once. Calls made while a poll is in flight share it. */
  public refresh(): Promise<ReadinessContext> {
    if (!this.pending) {
      this.pending = this.poll().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async poll(): Promise<ReadinessContext> {
    try {
      const info = await this.ledger.getRunningInfo();
      const wasReady = this.state.caught_up;
      this.state = {
        caught_up: info.db_caught_up,
        last_message_index: info.last_message_index,
        last_block_index: info.last_block?.block_index ?? null,
        testnet: info.running_testnet,
      };
      if (wasReady !== info.db_caught_up) {
        console.log(`[Readiness] caught_up=${info.db_caught_up} block=${this.state.last_block_index ?? '-'}`);
      }
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      if (this.state.caught_up) {
        console.warn(`[Readiness] Poll failed, marking not ready: ${message}`);
      }
      this.state = { ...this.state, caught_up: false };
    }
    return this.current();
  }

  public start(): void {
    if (this.timer) return;
    void this.refresh();
    this.timer = setInterval(() => {
      // one poll in flight at a time
      if (!this.pending) void this.refresh();
    }, this.pollMs);
  }

  public stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
