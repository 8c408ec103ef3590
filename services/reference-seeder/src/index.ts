/**
 * Reference Seeder
 *
 * Loads categories, embedded examples, services, buildings and service
 * assignments into Postgres. Safe to re-run; existing examples are only
 * re-embedded with --force.
 *
 * Usage: seed [--force] [--data <dir>]
 */

import path from 'path';
import {
  config,
  createOpenAiClients,
  getCorrelationId,
  logger,
  runWithContextAsync,
  type EmbeddingClient,
} from '@civic-appeals/shared';
import {
  ensureAssignment,
  exampleExists,
  pool,
  upsertBuilding,
  upsertCategory,
  upsertExample,
  upsertService,
} from './lib/db';
import { loadSeedData, type SeedData } from './lib/seed-data';

export interface SeedOptions {
  dataDir: string;
  force: boolean;
}

export interface SeedSummary {
  categories: number;
  examplesEmbedded: number;
  examplesSkipped: number;
  services: number;
  buildings: number;
  assignmentsCreated: number;
}

export function parseArgs(argv: readonly string[]): SeedOptions {
  const options: SeedOptions = {
    dataDir: path.join(__dirname, '..', 'data'),
    force: false,
  };

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--force') {
      options.force = true;
    } else if (argv[i] === '--data' && i + 1 < argv.length) {
      options.dataDir = path.resolve(argv[++i]);
    }
  }
  return options;
}

async function seed(data: SeedData, embedder: EmbeddingClient, force: boolean): Promise<SeedSummary> {
  const summary: SeedSummary = {
    categories: 0,
    examplesEmbedded: 0,
    examplesSkipped: 0,
    services: 0,
    buildings: 0,
    assignmentsCreated: 0,
  };
  const client = await pool.connect();

  try {
    await client.query('BEGIN');

    for (const category of data.categories) {
      await upsertCategory(client, category);
      summary.categories++;

      for (const example of category.examples) {
        if (!force && (await exampleExists(client, category.id, example.text))) {
          summary.examplesSkipped++;
          continue;
        }
        const embedding = await embedder.embed(example.text);
        await upsertExample(client, category.id, example, embedding);
        summary.examplesEmbedded++;
      }
    }

    const serviceIds = new Map<string, number>();
    for (const service of data.services) {
      serviceIds.set(service.name, await upsertService(client, service));
      summary.services++;
    }

    const buildingIds = new Map<string, number>();
    for (const building of data.buildings) {
      buildingIds.set(`${building.street_name}|${building.house_number}`, await upsertBuilding(client, building));
      summary.buildings++;
    }

    for (const assignment of data.assignments) {
      const serviceId = serviceIds.get(assignment.service);
      if (serviceId === undefined) {
        throw new Error(`Service "${assignment.service}" was not seeded`);
      }
      const buildingId = assignment.building
        ? buildingIds.get(`${assignment.building.street_name}|${assignment.building.house_number}`) ?? null
        : null;

      if (await ensureAssignment(client, assignment, serviceId, buildingId)) {
        summary.assignmentsCreated++;
      }
    }

    await client.query('COMMIT');
    return summary;
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error('Seeding failed', error);
    throw error;
  } finally {
    client.release();
  }
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const data = loadSeedData(options.dataDir);

  logger.info('Seeding reference data', {
    data_dir: options.dataDir,
    force: options.force,
    categories: data.categories.length,
    services: data.services.length,
  });

  const { embedder } = createOpenAiClients(config);
  try {
    const summary = await seed(data, embedder, options.force);
    logger.info('Seeding complete', { ...summary });
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  runWithContextAsync({ correlationId: getCorrelationId(), operation: 'seed' }, main)
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error('Seeder failed', error);
      process.exit(1);
    });
}
