/**
 * Request Sessions
 *
 * The pool behind the appeals API and the orchestrator built on it. Each
 * reference read runs in its own short read-only transaction, so a slow model
 * call never holds a connection.
 */

import { Pool } from 'pg';
import {
  config,
  createOpenAiClients,
  createOrchestrator,
  pgStoreSession,
  type ComplaintOrchestrator,
} from '@civic-appeals/shared';

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: config.dbPoolMax,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: config.dbConnectionTimeoutMs,
});

let orchestrator: ComplaintOrchestrator | undefined;

/**
 * Built on first use, so the API starts without an OpenAI key and only the
 * routes that need the models fail.
 */
export function getOrchestrator(): ComplaintOrchestrator {
  if (!orchestrator) {
    const { embedder, generator } = createOpenAiClients(config);
    orchestrator = createOrchestrator({ session: pgStoreSession(pool), embedder, generator, config });
  }
  return orchestrator;
}

export async function checkDatabase(): Promise<void> {
  await pool.query('SELECT 1');
}
