import { describeError, QuarryError } from "../core/errors";
import { SchemaRegistry, type EntitySchema } from "../core/schema";
import type { QuarryConfig } from "../runtime/config";
import type { PgClient } from "../runtime/pgClient";
import { Executor } from "./executor";
import { Repo } from "./repo";

/**
 * Root repo bound to a pooled client.
 * Statements run on whichever pooled connection is free; `transaction(...)` reserves one.
 * Next: `await db.close()` on shutdown.
 */
export class Database extends Repo {
  private _client: PgClient;

  constructor(
    client: PgClient,
    config: Pick<QuarryConfig, "batchSize" | "logger" | "logSql" | "isolationLevel">,
    schemas: SchemaRegistry | readonly EntitySchema[] = [],
  ) {
    const registry = schemas instanceof SchemaRegistry ? schemas : new SchemaRegistry(schemas);
    super({
      executor: new Executor(client, { logger: config.logger, logSql: config.logSql }),
      registry,
      batchSize: config.batchSize,
      logger: config.logger,
      logSql: config.logSql,
      ...(config.isolationLevel === undefined ? {} : { isolationLevel: config.isolationLevel }),
      reserve: async () => {
        try {
          return await client.reserve();
        } catch (error) {
          throw new QuarryError(
            "databaseError",
            `Could not reserve a connection: ${describeError(error)}`,
            { cause: error },
          );
        }
      },
    });
    this._client = client;
  }

  /** Close the pool; in-flight statements get `timeoutSeconds` to finish. */
  async close(timeoutSeconds?: number): Promise<void> {
    await this._client.end(timeoutSeconds === undefined ? {} : { timeout: timeoutSeconds });
  }
}
