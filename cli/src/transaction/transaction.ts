import fs from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../utils/logger';
import { PushGateError, TransactionError, describeError } from '../utils/errors';

export interface RollbackAction {
  description: string;
  undo: () => void;
}

export interface FileOperation {
  path: string;
  /** Backup copy of the content the path held before the write, if any. */
  previousSnapshot?: string;
  newContent: string;
}

export interface AtomicWriteOptions {
  mode?: number;
  /** Keep the backup after commit instead of deleting it. */
  keepBackup?: boolean;
}

export interface RollbackReport {
  attempted: number;
  failed: Array<{ description: string; error: string }>;
}

export interface TransactionOptions {
  logger?: Logger;
  now?: () => number;
}

/**
 * Ordered log of inverse actions. Each forward mutation registers its inverse
 * before it touches the filesystem, so a failure at any point leaves a log
 * that undoes exactly what happened.
 */
export class Transaction {
  readonly id = uuidv4();
  private name = '';
  private active = false;
  private actions: RollbackAction[] = [];
  private disposableBackups: string[] = [];
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: TransactionOptions = {}) {
    this.logger = options.logger ?? new Logger(null, 'transaction');
    this.now = options.now ?? Date.now;
  }

  get isActive(): boolean {
    return this.active;
  }

  get pendingActions(): number {
    return this.actions.length;
  }

  get transactionName(): string {
    return this.name;
  }

  begin(name: string): void {
    this.name = name;
    this.actions = [];
    this.disposableBackups = [];
    this.active = true;
    this.logger.info(`Transaction started: ${name}`, { transaction: this.id });
  }

  addRollback(action: RollbackAction): void {
    this.assertActive();
    this.actions.push(action);
    this.logger.debug(`Added rollback action: ${action.description}`);
  }

  commit(): void {
    if (!this.active) {
      return;
    }
    for (const backup of this.disposableBackups) {
      try {
        fs.rmSync(backup, { force: true });
      } catch (error: unknown) {
        this.logger.warn(`Could not remove backup ${backup}: ${describeError(error)}`);
      }
    }
    this.actions = [];
    this.disposableBackups = [];
    this.active = false;
    this.logger.info(`Transaction committed: ${this.name}`, { transaction: this.id });
  }

  /**
   * Runs the log newest-first. A failing action is logged and skipped so the
   * remaining ones still run.
   */
  rollback(): RollbackReport {
    const report: RollbackReport = { attempted: 0, failed: [] };
    if (!this.active) {
      return report;
    }

    this.logger.warn(`Rolling back transaction: ${this.name}`, { transaction: this.id, actions: this.actions.length });
    for (let i = this.actions.length - 1; i >= 0; i -= 1) {
      const action = this.actions[i];
      report.attempted += 1;
      try {
        action.undo();
        this.logger.debug(`Rolled back: ${action.description}`);
      } catch (error: unknown) {
        const message = describeError(error);
        report.failed.push({ description: action.description, error: message });
        this.logger.error(`Rollback action failed: ${action.description}: ${message}`);
      }
    }

    this.actions = [];
    this.disposableBackups = [];
    this.active = false;
    return report;
  }

  atomicWrite(filePath: string, content: string, options: AtomicWriteOptions = {}): FileOperation {
    this.assertActive();
    let previousSnapshot: string | undefined;

    if (fs.existsSync(filePath)) {
      const backup = this.backupPathFor(filePath);
      fs.copyFileSync(filePath, backup);
      previousSnapshot = backup;
      this.addRollback({
        description: `restore ${filePath} from ${backup}`,
        undo: () => fs.renameSync(backup, filePath),
      });
      if (!options.keepBackup) {
        this.disposableBackups.push(backup);
      }
    } else {
      this.ensureParentDir(filePath);
      this.addRollback({
        description: `remove ${filePath}`,
        undo: () => fs.rmSync(filePath, { force: true }),
      });
    }

    fs.writeFileSync(filePath, content, 'utf-8');
    if (options.mode !== undefined) {
      fs.chmodSync(filePath, options.mode);
    }
    this.logger.debug(`Atomic write completed: ${filePath}`);
    return { path: filePath, previousSnapshot, newContent: content };
  }

  /**
   * Moves `src` onto `dest`. An existing `dest` is set aside first; rollback
   * moves the new file back to `src` and then restores the old `dest`.
   */
  atomicMove(src: string, dest: string, options: { keepBackup?: boolean } = {}): string | undefined {
    this.assertActive();
    if (!fs.existsSync(src)) {
      throw new PushGateError(`Cannot move ${src}: no such file`, 1);
    }

    let backup: string | undefined;
    if (fs.existsSync(dest)) {
      const aside = this.backupPathFor(dest);
      backup = aside;
      this.addRollback({
        description: `restore ${dest} from ${aside}`,
        undo: () => {
          if (fs.existsSync(aside)) {
            fs.renameSync(aside, dest);
          }
        },
      });
      fs.renameSync(dest, aside);
      if (!options.keepBackup) {
        this.disposableBackups.push(aside);
      }
    } else {
      this.ensureParentDir(dest);
    }

    this.addRollback({
      description: `move ${dest} back to ${src}`,
      undo: () => {
        if (fs.existsSync(dest) && !fs.existsSync(src)) {
          fs.renameSync(dest, src);
        }
      },
    });
    fs.renameSync(src, dest);
    this.logger.debug(`Atomic move: ${src} -> ${dest}`);
    return backup;
  }

  atomicChmod(filePath: string, mode: number): void {
    this.assertActive();
    const previousMode = fs.statSync(filePath).mode & 0o7777;
    this.addRollback({
      description: `chmod ${filePath} back to ${previousMode.toString(8)}`,
      undo: () => fs.chmodSync(filePath, previousMode),
    });
    fs.chmodSync(filePath, mode);
  }

  /** Sets `filePath` aside; returns the backup path, or undefined if nothing was there. */
  atomicRemove(filePath: string, options: { keepBackup?: boolean } = {}): string | undefined {
    this.assertActive();
    if (!fs.existsSync(filePath)) {
      return undefined;
    }

    const backup = this.backupPathFor(filePath);
    this.addRollback({
      description: `restore removed ${filePath}`,
      undo: () => {
        if (fs.existsSync(backup)) {
          fs.renameSync(backup, filePath);
        }
      },
    });
    fs.renameSync(filePath, backup);
    if (!options.keepBackup) {
      this.disposableBackups.push(backup);
    }
    return backup;
  }

  private assertActive(): void {
    if (!this.active) {
      throw new PushGateError('No transaction is active', 1);
    }
  }

  private backupPathFor(filePath: string): string {
    const base = `${filePath}.backup.${this.now()}`;
    let candidate = base;
    let counter = 1;
    while (fs.existsSync(candidate)) {
      candidate = `${base}.${counter}`;
      counter += 1;
    }
    return candidate;
  }

  /** Creates missing parent directories, registering their removal (if still empty) first. */
  private ensureParentDir(filePath: string): void {
    const missing: string[] = [];
    let dir = path.dirname(path.resolve(filePath));
    while (!fs.existsSync(dir)) {
      missing.unshift(dir);
      const parent = path.dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }

    for (const created of missing) {
      this.addRollback({
        description: `remove directory ${created}`,
        undo: () => {
          if (fs.existsSync(created) && fs.readdirSync(created).length === 0) {
            fs.rmdirSync(created);
          }
        },
      });
      fs.mkdirSync(created);
    }
  }
}

const ROLLBACK_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export interface ScopedTransactionOptions extends TransactionOptions {
  /** Called after a signal-triggered rollback; defaults to process.exit. */
  exit?: (code: number) => void;
}

/**
 * Runs `work` inside a transaction. Success commits; a thrown error, a
 * termination signal or a process exit while the transaction is open rolls
 * it back first.
 */
export async function withTransaction<T>(
  name: string,
  work: (tx: Transaction) => Promise<T> | T,
  options: ScopedTransactionOptions = {},
): Promise<T> {
  const tx = new Transaction(options);
  const exit = options.exit ?? ((code: number) => process.exit(code));

  const signalHandlers = ROLLBACK_SIGNALS.map((signal) => {
    const handler = () => {
      tx.rollback();
      release();
      exit(128 + (os.constants.signals[signal] ?? 1));
    };
    return { signal, handler };
  });
  const exitHandler = () => {
    tx.rollback();
  };

  function release(): void {
    for (const { signal, handler } of signalHandlers) {
      process.removeListener(signal, handler);
    }
    process.removeListener('exit', exitHandler);
  }

  tx.begin(name);
  for (const { signal, handler } of signalHandlers) {
    process.once(signal, handler);
  }
  process.once('exit', exitHandler);

  try {
    const result = await work(tx);
    if (!tx.isActive) {
      throw new TransactionError(name, new Error('transaction was rolled back before it could commit'));
    }
    tx.commit();
    return result;
  } catch (error: unknown) {
    tx.rollback();
    if (error instanceof TransactionError) {
      throw error;
    }
    throw new TransactionError(name, error);
  } finally {
    release();
  }
}
