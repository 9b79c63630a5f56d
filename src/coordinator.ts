import { CommandRunner, PackageManagerBackend, PackageRecord, UpdateResult, UpgradeMap } from './types';
import { CommandTimeoutError, errorMessage, failureText, ToolUnavailableError } from './errors';
import { CycleKind, EventSink, InventoryEvent, nullSink } from './events';
import { countUpdates, hasUpdate } from './record';
import { reconcile } from './reconcile';

export type Phase = 'idle' | 'scanning' | 'checking' | 'updating';

export interface InventoryState {
  phase: Phase;
  records: PackageRecord[];
  updatesApplied: number;
}

export interface InventorySnapshot {
  phase: Phase;
  records: readonly PackageRecord[];
  updateCount: number;
  updatesApplied: number;
}

export interface Busy {
  status: 'busy';
  phase: Phase;
}

export interface Dropped {
  status: 'dropped';
}

interface FailureDetail {
  error: string;
  toolUnavailable: boolean;
  timedOut: boolean;
}

export interface Failed extends FailureDetail {
  status: 'failed';
}

export type ScanOutcome = { status: 'ok'; records: readonly PackageRecord[] } | Failed | Busy | Dropped;

export type CheckOutcome = { status: 'ok'; updateCount: number; matched: number } | Failed | Busy | Dropped;

export interface UpdateReport {
  status: 'ok';
  bulk: boolean;
  ids: string[];
  successCount: number;
  total: number;
  /** Per-item results. Empty for a bulk run, which has a single exit code. */
  results: UpdateResult[];
  errorText?: string;
  rescan: ScanOutcome;
}

export type UpdateOutcome = UpdateReport | { status: 'nothing-to-update' } | Busy | Dropped;

export interface RefreshOutcome {
  scan: ScanOutcome;
  check?: CheckOutcome;
}

type WorkerResult<T> = { ok: true; value: T } | ({ ok: false } & FailureDetail);

interface BatchResult {
  successCount: number;
  results: UpdateResult[];
  errorText?: string;
}

export interface CoordinatorOptions {
  backend: PackageManagerBackend;
  runner: CommandRunner;
  events?: EventSink;
  debug?: (message: string) => void;
}

/**
 * Owns the inventory and runs one scan, check or update cycle at a time.
 *
 * Each cycle runs as a detached worker that only talks to the external tool
 * and returns a result; the coordinator applies that result to the record set
 * when the worker settles. A request made while a cycle is in flight is
 * answered with `busy` and forgotten. After {@link shutdown} results of
 * workers still running are dropped unapplied.
 */
export class InventoryCoordinator {
  private readonly state: InventoryState = { phase: 'idle', records: [], updatesApplied: 0 };
  private readonly backend: PackageManagerBackend;
  private readonly runner: CommandRunner;
  private readonly events: EventSink;
  private readonly debug: (message: string) => void;
  private closed = false;

  constructor(options: CoordinatorOptions) {
    this.backend = options.backend;
    this.runner = options.runner;
    this.events = options.events ?? nullSink;
    this.debug = options.debug ?? (() => {});
  }

  get phase(): Phase {
    return this.state.phase;
  }

  snapshot(): InventorySnapshot {
    return {
      phase: this.state.phase,
      records: [...this.state.records],
      updateCount: countUpdates(this.state.records),
      updatesApplied: this.state.updatesApplied,
    };
  }

  /** Ids of every record currently marked updatable, in inventory order. */
  updatableIds(): string[] {
    return this.state.records.filter(hasUpdate).map((r) => r.id);
  }

  scan(): Promise<ScanOutcome> {
    const rejected = this.admit('scanning');
    if (rejected) return Promise.resolve(rejected);
    this.debug('Starting inventory scan');

    return this.work(async () => {
      const result = await this.runner(this.backend.listCommand());
      this.debug(`list returned code: ${result.exitCode}`);
      return this.backend.parseInventory(result.stdout);
    }).then((result) => this.completeScan(result));
  }

  check(): Promise<CheckOutcome> {
    const rejected = this.admit('checking');
    if (rejected) return Promise.resolve(rejected);
    this.debug('Checking for updates');

    return this.work(async () => {
      const result = await this.runner(this.backend.upgradableCommand());
      this.debug(`upgrade listing returned code: ${result.exitCode}`);
      return this.backend.parseUpgrades(result.stdout);
    }).then((result) => this.completeCheck(result));
  }

  /** Scan, then check when the scan succeeded. */
  async refresh(): Promise<RefreshOutcome> {
    const scan = await this.scan();
    if (scan.status !== 'ok') return { scan };
    const check = await this.check();
    return { scan, check };
  }

  /**
   * Updates each id with its own invocation, one after another. A failure is
   * recorded and the sequence carries on.
   */
  update(ids: readonly string[]): Promise<UpdateOutcome> {
    const targets = [...new Set(ids)];
    const rejected = this.admitUpdate(targets);
    if (rejected) return Promise.resolve(rejected);
    this.emit({ type: 'update_started', ids: targets, isBulk: false });

    return this.updateEach(targets).then((batch) => this.completeUpdate(false, targets, batch));
  }

  /**
   * Updates every updatable record with one bulk invocation. Its exit code
   * stands for the whole batch: all succeeded or all are reported failed.
   */
  updateAll(): Promise<UpdateOutcome> {
    const targets = this.updatableIds();
    const rejected = this.admitUpdate(targets);
    if (rejected) return Promise.resolve(rejected);
    this.emit({ type: 'update_started', ids: targets, isBulk: true });

    return this.updateBulk(targets).then((batch) => this.completeUpdate(true, targets, batch));
  }

  /** Logs the session summary and stops applying worker results. */
  shutdown(): void {
    if (this.closed) return;
    this.emit({
      type: 'session_summary',
      total: this.state.records.length,
      updatableCount: countUpdates(this.state.records),
      appliedCount: this.state.updatesApplied,
    });
    this.closed = true;
  }

  private admit(phase: Exclude<Phase, 'idle'>): Busy | Dropped | null {
    if (this.closed) return { status: 'dropped' };
    if (this.state.phase !== 'idle') {
      this.debug(`Ignoring ${phase} request while ${this.state.phase}`);
      return { status: 'busy', phase: this.state.phase };
    }
    this.state.phase = phase;
    return null;
  }

  private admitUpdate(targets: string[]): Busy | Dropped | { status: 'nothing-to-update' } | null {
    if (!this.closed && this.state.phase === 'idle' && targets.length === 0) {
      return { status: 'nothing-to-update' };
    }
    return this.admit('updating');
  }

  // A sink that throws must not stop a cycle half way.
  private emit(event: InventoryEvent): void {
    try {
      this.events.emit(event);
    } catch (e: unknown) {
      this.debug(`Event sink failed on ${event.type}: ${errorMessage(e)}`);
    }
  }

  // Worker boundary: nothing thrown by the runner or a parser escapes.
  private async work<T>(task: () => Promise<T>): Promise<WorkerResult<T>> {
    try {
      return { ok: true, value: await task() };
    } catch (e: unknown) {
      return {
        ok: false,
        error: errorMessage(e),
        toolUnavailable: e instanceof ToolUnavailableError,
        timedOut: e instanceof CommandTimeoutError,
      };
    }
  }

  private fail(cycle: CycleKind, result: FailureDetail): Failed {
    this.emit({ type: 'cycle_failed', cycle, message: result.error });
    return {
      status: 'failed',
      error: result.error,
      toolUnavailable: result.toolUnavailable,
      timedOut: result.timedOut,
    };
  }

  private completeScan(result: WorkerResult<PackageRecord[]>): ScanOutcome {
    if (this.closed) return { status: 'dropped' };
    this.state.phase = 'idle';
    if (!result.ok) return this.fail('scan', result);

    this.state.records = result.value;
    this.emit({ type: 'scan_completed', records: this.state.records });
    return { status: 'ok', records: this.state.records };
  }

  private completeCheck(result: WorkerResult<UpgradeMap>): CheckOutcome {
    if (this.closed) return { status: 'dropped' };
    this.state.phase = 'idle';
    if (!result.ok) return this.fail('check', result);

    const matched = reconcile(this.state.records, result.value);
    this.emit({ type: 'updates_found', records: this.state.records });
    return { status: 'ok', updateCount: countUpdates(this.state.records), matched };
  }

  private async updateOne(id: string): Promise<UpdateResult> {
    const result = await this.work(async () => this.runner(this.backend.upgradeCommand(id)));
    if (!result.ok) return { id, success: false, errorText: result.error };
    if (result.value.exitCode === 0) return { id, success: true };
    return { id, success: false, errorText: failureText(result.value) };
  }

  private async updateEach(ids: string[]): Promise<BatchResult> {
    const results: UpdateResult[] = [];
    for (const id of ids) {
      this.debug(`Updating: ${id}`);
      const result = await this.updateOne(id);
      this.emit({ type: 'update_result', ...result });
      results.push(result);
    }
    return { successCount: results.filter((r) => r.success).length, results };
  }

  private async updateBulk(ids: string[]): Promise<BatchResult> {
    const result = await this.work(async () => this.runner(this.backend.upgradeAllCommand()));
    const success = result.ok && result.value.exitCode === 0;
    const errorText = result.ok ? (success ? undefined : failureText(result.value)) : result.error;
    this.emit({ type: 'bulk_update_result', ids, success, errorText });
    return { successCount: success ? ids.length : 0, results: [], errorText };
  }

  private async completeUpdate(bulk: boolean, ids: string[], batch: BatchResult): Promise<UpdateOutcome> {
    if (this.closed) return { status: 'dropped' };
    this.state.updatesApplied += batch.successCount;
    this.state.phase = 'idle';

    // Installed versions are only ever learned from a fresh listing.
    const rescan = await this.scan();
    return {
      status: 'ok',
      bulk,
      ids,
      successCount: batch.successCount,
      total: ids.length,
      results: batch.results,
      errorText: batch.errorText,
      rescan,
    };
  }
}
