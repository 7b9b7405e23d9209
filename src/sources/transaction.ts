import { randomUUID } from "node:crypto";
import { describeError, noActiveTransaction } from "../core/errors";
import { checkIdent } from "../core/sql";
import type { IsolationLevel, Logger } from "../runtime/config";
import type { PgSession } from "../runtime/pgClient";
import { Executor } from "./executor";

export type TransactionState = "idle" | "active" | "committed" | "rolledBack";

export type TransactionOptions = {
  logger: Logger;
  logSql: boolean;
  isolationLevel?: IsolationLevel;
};

/**
 * One `BEGIN ... COMMIT | ROLLBACK` span on a connection it owns exclusively.
 * Moves `idle -> active -> committed | rolledBack`; the end states are final.
 * Statements are queued so concurrent callers never interleave on the session.
 */
export class Transaction {
  private _state: TransactionState = "idle";
  private _executor: Executor;
  private _logger: Logger;
  private _isolationLevel: IsolationLevel | undefined;

  constructor(session: PgSession, options: TransactionOptions) {
    this._logger = options.logger;
    this._isolationLevel = options.isolationLevel;
    this._executor = new Executor(session, {
      logger: options.logger,
      logSql: options.logSql,
      serial: true,
      guard: () => this.assertActive(),
    });
  }

  get state(): TransactionState {
    return this._state;
  }

  get executor(): Executor {
    return this._executor;
  }

  get isActive(): boolean {
    return this._state === "active";
  }

  assertActive(): void {
    if (this._state === "idle") {
      throw noActiveTransaction("transaction has not begun");
    }
    if (this._state !== "active") {
      throw noActiveTransaction(`transaction already ${this._state === "committed" ? "committed" : "rolled back"}`);
    }
  }

  /**
   * Begin, run `work`, then commit; roll back and rethrow if anything fails.
   * A failed rollback is logged and never replaces the original error.
   */
  async run<T>(work: () => Promise<T>): Promise<T> {
    await this._begin();
    try {
      const result = await work();
      await this._statement("COMMIT");
      this._state = "committed";
      return result;
    } catch (error) {
      if (this._state === "active") {
        await this._rollback();
      }
      throw error;
    }
  }

  /**
   * Run `work` inside `SAVEPOINT`; on failure roll back to it and release it, then rethrow.
   * The generated name carries a random suffix so concurrent savepoints never collide.
   */
  async savepoint<T>(name: string, work: () => Promise<T>): Promise<T> {
    this.assertActive();
    const savepoint = `sp_${checkIdent(name)}_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
    await this._statement(`SAVEPOINT ${savepoint}`);
    try {
      const result = await work();
      await this._statement(`RELEASE SAVEPOINT ${savepoint}`);
      return result;
    } catch (error) {
      await this._bestEffort(`ROLLBACK TO SAVEPOINT ${savepoint}`);
      await this._bestEffort(`RELEASE SAVEPOINT ${savepoint}`);
      throw error;
    }
  }

  private async _begin(): Promise<void> {
    if (this._state !== "idle") {
      throw noActiveTransaction(`cannot begin a transaction that is ${this._state}`);
    }
    this._state = "active";
    const sql = this._isolationLevel
      ? `BEGIN ISOLATION LEVEL ${this._isolationLevel}`
      : "BEGIN";
    try {
      await this._statement(sql);
    } catch (error) {
      this._state = "rolledBack";
      throw error;
    }
  }

  private async _rollback(): Promise<void> {
    await this._bestEffort("ROLLBACK");
    this._state = "rolledBack";
  }

  private async _statement(sql: string): Promise<void> {
    await this._executor.execute({ sql, params: [] });
  }

  private async _bestEffort(sql: string): Promise<void> {
    try {
      await this._statement(sql);
    } catch (error) {
      this._logger.warn(`[quarry] ${sql} failed: ${describeError(error)}`);
    }
  }
}
