/**
 * Seeding Upserts
 *
 * Every statement is idempotent: re-running the seeder updates rows in place
 * and never duplicates them.
 */

import { Pool, PoolClient } from 'pg';
import { config, dbQueryDurationHistogram, toVectorLiteral } from '@civic-appeals/shared';
import type { SeedAssignment, SeedBuilding, SeedCategory, SeedExample, SeedService } from './seed-data';

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 2,
});

type IdRow = { id: number };

async function timed<T>(operation: string, run: () => Promise<T>): Promise<T> {
  const end = dbQueryDurationHistogram.startTimer({ operation });
  try {
    return await run();
  } finally {
    end();
  }
}

function firstId(rows: IdRow[], what: string): number {
  const row = rows[0];
  if (!row) {
    throw new Error(`Upsert returned no id for ${what}`);
  }
  return row.id;
}

export async function upsertCategory(client: PoolClient, category: SeedCategory): Promise<void> {
  await timed('upsert_category', () =>
    client.query(
      `INSERT INTO categories (id, name, description)
       VALUES ($1, $2, $3)
       ON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name, description = EXCLUDED.description`,
      [category.id, category.name, category.description]
    )
  );
}

export async function exampleExists(client: PoolClient, categoryId: string, text: string): Promise<boolean> {
  const result = await timed('find_example', () =>
    client.query<IdRow>('SELECT id FROM examples WHERE category_id = $1 AND text = $2', [categoryId, text])
  );
  return result.rows.length > 0;
}

export async function upsertExample(
  client: PoolClient,
  categoryId: string,
  example: SeedExample,
  embedding: number[]
): Promise<void> {
  await timed('upsert_example', () =>
    client.query(
      `INSERT INTO examples (category_id, text, is_urgent, embedding)
       VALUES ($1, $2, $3, $4::vector)
       ON CONFLICT (category_id, text) DO UPDATE
         SET is_urgent = EXCLUDED.is_urgent, embedding = EXCLUDED.embedding`,
      [categoryId, example.text, example.is_urgent, toVectorLiteral(embedding)]
    )
  );
}

export async function upsertService(client: PoolClient, service: SeedService): Promise<number> {
  const result = await timed('upsert_service', () =>
    client.query<IdRow>(
      `INSERT INTO services (name, type, phone, email, legal_address, website, is_emergency)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (name) DO UPDATE SET
         type = EXCLUDED.type,
         phone = EXCLUDED.phone,
         email = EXCLUDED.email,
         legal_address = EXCLUDED.legal_address,
         website = EXCLUDED.website,
         is_emergency = EXCLUDED.is_emergency
       RETURNING id`,
      [
        service.name,
        service.type,
        service.phone,
        service.email,
        service.legal_address,
        service.website,
        service.is_emergency,
      ]
    )
  );
  return firstId(result.rows, `service ${service.name}`);
}

export async function upsertBuilding(client: PoolClient, building: SeedBuilding): Promise<number> {
  const result = await timed('upsert_building', () =>
    client.query<IdRow>(
      `INSERT INTO buildings (city, district, street_name, house_number)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (city, street_name, house_number) DO UPDATE SET district = EXCLUDED.district
       RETURNING id`,
      [building.city, building.district, building.street_name, building.house_number]
    )
  );
  return firstId(result.rows, `building ${building.street_name} ${building.house_number}`);
}

/**
 * Insert the assignment unless an identical one exists. Returns true when created.
 */
export async function ensureAssignment(
  client: PoolClient,
  assignment: SeedAssignment,
  serviceId: number,
  buildingId: number | null
): Promise<boolean> {
  const existing = await timed('find_assignment', () =>
    client.query<IdRow>(
      `SELECT id FROM service_assignments
       WHERE service_id = $1 AND category_id = $2 AND coverage_level = $3
         AND building_id IS NOT DISTINCT FROM $4`,
      [serviceId, assignment.category_id, assignment.coverage_level, buildingId]
    )
  );

  if (existing.rows.length > 0) {
    await client.query('UPDATE service_assignments SET is_primary = $2 WHERE id = $1', [
      firstId(existing.rows, 'assignment'),
      assignment.is_primary,
    ]);
    return false;
  }

  await timed('insert_assignment', () =>
    client.query(
      `INSERT INTO service_assignments (service_id, category_id, building_id, coverage_level, is_primary)
       VALUES ($1, $2, $3, $4, $5)`,
      [serviceId, assignment.category_id, buildingId, assignment.coverage_level, assignment.is_primary]
    )
  );
  return true;
}
