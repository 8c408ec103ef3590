/**
 * PostgreSQL Reference Store
 *
 * Reads categories, examples (pgvector), services, buildings and assignments.
 * Bound to one client, so every query shares the read-only transaction that
 * client is in.
 */

import type { Pool, PoolClient } from 'pg';
import { logger } from '../logger';
import { dbQueryDurationHistogram, vectorSearchDurationHistogram } from '../metrics';
import { boundedDistance } from '../retrieval/cosine';
import type { ExampleFilter, ExampleIndex, ScoredExample } from '../retrieval/types';
import {
  toCoverageLevel,
  toServiceType,
  type Building,
  type Category,
  type Service,
  type ServiceAssignment,
} from '../types';
import type { StoreSession } from './session';
import type { AssignedService, AssignmentQuery, ReferenceStore } from './types';

type CategoryRow = {
  id: string;
  name: string;
  description: string;
};

type ExampleRow = {
  id: number;
  category_id: string;
  text: string;
  is_urgent: boolean;
  embedding: string;
  distance: number | null;
};

type ServiceRow = {
  service_id: number;
  service_name: string;
  service_type: string;
  phone: string | null;
  email: string | null;
  legal_address: string | null;
  website: string | null;
  is_emergency: boolean;
};

type BuildingRow = {
  id: number;
  city: string;
  district: string | null;
  street_name: string;
  house_number: string;
};

type AssignmentRow = ServiceRow & {
  assignment_id: number;
  category_id: string;
  building_id: number | null;
  coverage_level: string;
  is_primary: boolean;
};

const SERVICE_COLUMNS = `s.id AS service_id, s.name AS service_name, s.type AS service_type,
       s.phone, s.email, s.legal_address, s.website, s.is_emergency`;

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

/** pgvector text form "[0.1,0.2]" */
export function toVectorLiteral(embedding: readonly number[]): string {
  return `[${embedding.join(',')}]`;
}

function parseVector(value: string): number[] {
  const parsed: unknown = JSON.parse(value);
  return Array.isArray(parsed) ? parsed.filter((n): n is number => typeof n === 'number') : [];
}

function mapService(row: ServiceRow): Service {
  const type = toServiceType(row.service_type);
  if (!type) {
    throw new Error(`Service ${row.service_id} has unknown type "${row.service_type}"`);
  }
  return {
    id: row.service_id,
    name: row.service_name,
    type,
    contacts: {
      phone: row.phone,
      email: row.email,
      legal_address: row.legal_address,
      website: row.website,
    },
    is_emergency: row.is_emergency,
  };
}

function mapAssignment(row: AssignmentRow): ServiceAssignment {
  const coverageLevel = toCoverageLevel(row.coverage_level);
  if (!coverageLevel) {
    throw new Error(`Assignment ${row.assignment_id} has unknown coverage level "${row.coverage_level}"`);
  }
  return {
    id: row.assignment_id,
    service_id: row.service_id,
    category_id: row.category_id,
    building_id: row.building_id,
    coverage_level: coverageLevel,
    is_primary: row.is_primary,
  };
}

export class PgReferenceStore implements ReferenceStore, ExampleIndex {
  constructor(private readonly client: PoolClient) {}

  private async timed<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const end = dbQueryDurationHistogram.startTimer({ operation });
    try {
      return await run();
    } catch (error) {
      logger.error('Reference query failed', error, { operation });
      throw error;
    } finally {
      end();
    }
  }

  async nearest(embedding: number[], k: number, filter?: ExampleFilter): Promise<ScoredExample[]> {
    if (k <= 0) {
      return [];
    }

    const end = vectorSearchDurationHistogram.startTimer({ backend: 'pgvector' });
    try {
      // Ordered by the raw operator so the HNSW cosine index applies
      const result = await this.client.query<ExampleRow>(
        `SELECT id, category_id, text, is_urgent, embedding::text AS embedding,
                embedding <=> $1::vector AS distance
         FROM examples
         WHERE ($3::int IS NULL OR id >= $3::int)
           AND ($4::int IS NULL OR id <= $4::int)
         ORDER BY embedding <=> $1::vector, id
         LIMIT $2`,
        [toVectorLiteral(embedding), k, filter?.minId ?? null, filter?.maxId ?? null]
      );

      return result.rows
        .map((row) => ({
          example: {
            id: row.id,
            category_id: row.category_id,
            text: row.text,
            is_urgent: row.is_urgent,
            embedding: parseVector(row.embedding),
          },
          distance: boundedDistance(row.distance),
        }))
        .sort((a, b) => a.distance - b.distance || a.example.id - b.example.id);
    } finally {
      end();
    }
  }

  async listCategories(): Promise<Category[]> {
    return this.timed('list_categories', async () => {
      const result = await this.client.query<CategoryRow>(
        'SELECT id, name, description FROM categories ORDER BY id'
      );
      return result.rows;
    });
  }

  async getCategory(id: string): Promise<Category | null> {
    return this.timed('get_category', async () => {
      const result = await this.client.query<CategoryRow>(
        'SELECT id, name, description FROM categories WHERE id = $1',
        [id]
      );
      return result.rows[0] ?? null;
    });
  }

  async findServiceByName(name: string): Promise<Service | null> {
    return this.timed('find_service_by_name', async () => {
      const result = await this.client.query<ServiceRow>(
        `SELECT ${SERVICE_COLUMNS} FROM services s WHERE s.name = $1 ORDER BY s.id LIMIT 1`,
        [name]
      );
      const row = result.rows[0];
      return row ? mapService(row) : null;
    });
  }

  async findBuildingsByStreetTokens(city: string, tokens: readonly string[]): Promise<Building[]> {
    const patterns = tokens.filter((token) => token.length > 0).map((token) => `%${escapeLike(token)}%`);
    if (patterns.length === 0) {
      return [];
    }

    return this.timed('find_buildings', async () => {
      const result = await this.client.query<BuildingRow>(
        `SELECT id, city, district, street_name, house_number
         FROM buildings
         WHERE city = $1 AND street_name ILIKE ANY($2::text[])
         ORDER BY id`,
        [city, patterns]
      );
      return result.rows;
    });
  }

  async findServiceAssignments(query: AssignmentQuery): Promise<AssignedService[]> {
    const conditions: string[] = ['a.category_id = $1'];
    const params: Array<string | number | boolean | string[]> = [query.categoryId];
    let paramIndex = 2;

    if (query.isEmergency !== undefined) {
      conditions.push(`s.is_emergency = $${paramIndex++}`);
      params.push(query.isEmergency);
    }
    if (query.serviceTypes) {
      conditions.push(`s.type = ANY($${paramIndex++}::text[])`);
      params.push([...query.serviceTypes]);
    }
    if (query.coverageLevel !== undefined) {
      conditions.push(`a.coverage_level = $${paramIndex++}`);
      params.push(query.coverageLevel);
    }
    if (query.buildingId !== undefined) {
      conditions.push(`a.building_id = $${paramIndex++}`);
      params.push(query.buildingId);
    }
    if (query.primaryOnly) {
      conditions.push('a.is_primary');
    }
    if (query.serviceNameContains !== undefined) {
      conditions.push(`s.name ILIKE $${paramIndex++}`);
      params.push(`%${escapeLike(query.serviceNameContains)}%`);
    }

    return this.timed('find_service_assignments', async () => {
      const result = await this.client.query<AssignmentRow>(
        `SELECT a.id AS assignment_id, a.category_id, a.building_id, a.coverage_level, a.is_primary,
                ${SERVICE_COLUMNS}
         FROM service_assignments a
         JOIN services s ON s.id = a.service_id
         WHERE ${conditions.join(' AND ')}
         ORDER BY a.is_primary DESC, a.id ASC`,
        params
      );
      return result.rows.map((row) => ({ service: mapService(row), assignment: mapAssignment(row) }));
    });
  }
}

/**
 * Run `fn` inside a read-only transaction on a pooled client. Keep it short:
 * the client is checked out until `fn` settles.
 */
export async function withReadSession<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN READ ONLY');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.warn('Rollback of read-only session failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    }
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Session runner over a pool: each session is one read-only transaction.
 */
export function pgStoreSession(pool: Pool): StoreSession {
  return (fn) => withReadSession(pool, (client) => fn(new PgReferenceStore(client)));
}
