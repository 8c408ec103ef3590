/**
 * Reference Seed Data Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_ROUTING_POLICY, config } from '@civic-appeals/shared';
import { checkReferences, loadSeedData, type SeedData } from '../../services/reference-seeder/src/lib/seed-data';
import { parseArgs } from '../../services/reference-seeder/src/index';

const DATA_DIR = path.join(__dirname, '../../services/reference-seeder/data');

describe('seed data', () => {
  const data = loadSeedData(DATA_DIR);

  it('loads the bundled reference data', () => {
    expect(data.categories).toHaveLength(10);
    expect(data.services).toHaveLength(12);
    expect(data.buildings).toHaveLength(4);
    expect(data.assignments).toHaveLength(18);
  });

  it('includes the hotline and every routed category', () => {
    const categoryIds = data.categories.map((category) => category.id);

    expect(data.services.map((service) => service.name)).toContain(config.hotlineServiceName);
    expect(categoryIds).toContain('other');
    for (const id of [...DEFAULT_ROUTING_POLICY.districtCategories, ...DEFAULT_ROUTING_POLICY.citywideCategories]) {
      expect(categoryIds).toContain(id);
    }
  });

  it('gives every category at least one example', () => {
    for (const category of data.categories) {
      expect(category.examples.length).toBeGreaterThan(0);
    }
  });
});

describe('checkReferences', () => {
  const base: SeedData = {
    categories: [{ id: 'roads', name: 'Дороги', description: '', examples: [] }],
    services: [
      {
        name: 'Адміністрація',
        type: 'district_admin',
        phone: null,
        email: null,
        legal_address: null,
        website: null,
        is_emergency: false,
      },
    ],
    buildings: [{ city: 'Львів', district: null, street_name: 'Городоцька', house_number: '15' }],
    assignments: [],
  };

  it('accepts consistent data', () => {
    expect(
      checkReferences({
        ...base,
        assignments: [
          {
            service: 'Адміністрація',
            category_id: 'roads',
            coverage_level: 'building',
            is_primary: true,
            building: { street_name: 'Городоцька', house_number: '15' },
          },
        ],
      })
    ).toEqual([]);
  });

  it('reports unknown services, categories and buildings', () => {
    const problems = checkReferences({
      ...base,
      assignments: [
        { service: 'Нема', category_id: 'noise', coverage_level: 'citywide', is_primary: true },
        { service: 'Адміністрація', category_id: 'roads', coverage_level: 'building', is_primary: true },
        {
          service: 'Адміністрація',
          category_id: 'roads',
          coverage_level: 'building',
          is_primary: false,
          building: { street_name: 'Городоцька', house_number: '16' },
        },
      ],
    });

    expect(problems).toEqual([
      'assignments[0]: unknown service "Нема"',
      'assignments[0]: unknown category "noise"',
      'assignments[1]: building coverage without a building',
      'assignments[2]: unknown building Городоцька 16',
    ]);
  });
});

describe('loadSeedData', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'seed-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('rejects files that break the seed schema', () => {
    fs.writeFileSync(path.join(dir, 'categories.json'), JSON.stringify({ categories: [{ id: 'roads' }] }));
    fs.writeFileSync(path.join(dir, 'services.json'), JSON.stringify({ services: [], buildings: [], assignments: [] }));

    expect(() => loadSeedData(dir)).toThrow("categories.json/categories/0: must have required property 'name'");
  });
});

describe('parseArgs', () => {
  it('reads --force and --data', () => {
    expect(parseArgs(['--force', '--data', 'fixtures'])).toEqual({
      dataDir: path.resolve('fixtures'),
      force: true,
    });
  });

  it('defaults to the bundled data directory', () => {
    expect(parseArgs([])).toEqual({
      dataDir: path.resolve(DATA_DIR),
      force: false,
    });
  });
});
