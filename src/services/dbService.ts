import { Client } from "pg";
import type { PgConfig } from "../config/config";
import { createTableQueries, dropTableQueries } from "../sql/queries";
import { logger } from "../utils/logger";

function newClient(pg: PgConfig, database = pg.database): Client {
  return new Client({
    host: pg.host,
    port: pg.port,
    user: pg.user,
    password: pg.password,
    database,
  });
}

/**
 * Ensure the target PostgreSQL database exists.
 * If it doesn't exist, this function creates it.
 */
export async function ensureDatabaseExists(pg: PgConfig): Promise<void> {
  const adminClient = newClient(pg, "postgres"); // default db for admin tasks
  const targetDb = pg.database;

  try {
    await adminClient.connect();
    const res = await adminClient.query(
      "SELECT 1 FROM pg_database WHERE datname = $1",
      [targetDb]
    );
    if (res.rowCount === 0) {
      logger.info(
        `Database "${targetDb}" does not exist. Creating database...`
      );
      // CREATE DATABASE cannot be parameterized.
      await adminClient.query(`CREATE DATABASE "${targetDb}"`);
      logger.info(`Database "${targetDb}" created successfully.`);
    } else {
      logger.info(`Database "${targetDb}" already exists.`);
    }
  } catch (err) {
    logger.error("Error ensuring database exists: " + err);
    throw err;
  } finally {
    await adminClient.end();
  }
}

/**
 * Runs `work` inside one transaction on a dedicated connection.
 * Commits when `work` resolves, rolls back when anything throws, and always
 * closes the connection.
 */
export async function withTransaction<T>(
  pg: PgConfig,
  work: (client: Client) => Promise<T>
): Promise<T> {
  const client = newClient(pg);

  try {
    await client.connect();
    logger.info(`Connected to PostgreSQL database "${pg.database}"`);
    await client.query("BEGIN");
    let result: T;
    try {
      result = await work(client);
    } catch (err) {
      try {
        await client.query("ROLLBACK");
        logger.info("Transaction rolled back.");
      } catch (rollbackErr) {
        logger.error(`Rollback failed: ${rollbackErr}`);
      }
      throw err;
    }
    await client.query("COMMIT");
    logger.info("Transaction committed.");
    return result;
  } finally {
    await client.end();
    logger.info("Disconnected from PostgreSQL");
  }
}

/**
 * Drops and recreates the warehouse tables.
 */
export async function resetTables(pg: PgConfig): Promise<void> {
  await withTransaction(pg, async (client) => {
    for (const query of dropTableQueries) {
      await client.query(query);
    }
    for (const query of createTableQueries) {
      await client.query(query);
    }
  });
  logger.info(`Recreated ${createTableQueries.length} schema objects.`);
}
