/**
 * Seed Data Loading
 *
 * Reads categories.json and services.json, validates their shape with Ajv and
 * checks cross references before anything touches the database.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject } from 'ajv';
import type { CoverageLevel, ServiceType } from '@civic-appeals/shared';

export interface SeedExample {
  text: string;
  is_urgent: boolean;
}

export interface SeedCategory {
  id: string;
  name: string;
  description: string;
  examples: SeedExample[];
}

export interface SeedService {
  name: string;
  type: ServiceType;
  phone: string | null;
  email: string | null;
  legal_address: string | null;
  website: string | null;
  is_emergency: boolean;
}

export interface SeedBuilding {
  city: string;
  district: string | null;
  street_name: string;
  house_number: string;
}

export interface SeedAssignment {
  /** Service name */
  service: string;
  category_id: string;
  coverage_level: CoverageLevel;
  is_primary: boolean;
  building?: { street_name: string; house_number: string };
}

export interface CategoriesFile {
  categories: SeedCategory[];
}

export interface ServicesFile {
  services: SeedService[];
  buildings: SeedBuilding[];
  assignments: SeedAssignment[];
}

export interface SeedData extends CategoriesFile, ServicesFile {}

const ajv = new Ajv2020({ strict: false, allErrors: true });

const nullableString = { type: ['string', 'null'] };

const validateCategories = ajv.compile<CategoriesFile>({
  type: 'object',
  required: ['categories'],
  properties: {
    categories: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name', 'description', 'examples'],
        properties: {
          id: { type: 'string', minLength: 1 },
          name: { type: 'string', minLength: 1 },
          description: { type: 'string' },
          examples: {
            type: 'array',
            items: {
              type: 'object',
              required: ['text', 'is_urgent'],
              properties: {
                text: { type: 'string', minLength: 1 },
                is_urgent: { type: 'boolean' },
              },
            },
          },
        },
      },
    },
  },
});

const validateServices = ajv.compile<ServicesFile>({
  type: 'object',
  required: ['services', 'buildings', 'assignments'],
  properties: {
    services: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'type', 'phone', 'email', 'legal_address', 'website', 'is_emergency'],
        properties: {
          name: { type: 'string', minLength: 1 },
          type: { enum: ['emergency_dispatch', 'city_monopoly', 'district_admin', 'building_manager'] },
          phone: nullableString,
          email: nullableString,
          legal_address: nullableString,
          website: nullableString,
          is_emergency: { type: 'boolean' },
        },
      },
    },
    buildings: {
      type: 'array',
      items: {
        type: 'object',
        required: ['city', 'district', 'street_name', 'house_number'],
        properties: {
          city: { type: 'string', minLength: 1 },
          district: nullableString,
          street_name: { type: 'string', minLength: 1 },
          house_number: { type: 'string', minLength: 1 },
        },
      },
    },
    assignments: {
      type: 'array',
      items: {
        type: 'object',
        required: ['service', 'category_id', 'coverage_level', 'is_primary'],
        properties: {
          service: { type: 'string', minLength: 1 },
          category_id: { type: 'string', minLength: 1 },
          coverage_level: { enum: ['building', 'district', 'citywide'] },
          is_primary: { type: 'boolean' },
          building: {
            type: 'object',
            required: ['street_name', 'house_number'],
            properties: {
              street_name: { type: 'string' },
              house_number: { type: 'string' },
            },
          },
        },
      },
    },
  },
});

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function formatErrors(file: string, errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${file}${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Problems that would break foreign keys or make an assignment unreachable.
 */
export function checkReferences(data: SeedData): string[] {
  const problems: string[] = [];
  const categoryIds = new Set(data.categories.map((category) => category.id));
  const serviceNames = new Set(data.services.map((service) => service.name));
  const buildingKeys = new Set(data.buildings.map((b) => `${b.street_name}|${b.house_number}`));

  data.assignments.forEach((assignment, i) => {
    if (!serviceNames.has(assignment.service)) {
      problems.push(`assignments[${i}]: unknown service "${assignment.service}"`);
    }
    if (!categoryIds.has(assignment.category_id)) {
      problems.push(`assignments[${i}]: unknown category "${assignment.category_id}"`);
    }
    if (assignment.coverage_level === 'building') {
      const building = assignment.building;
      if (!building) {
        problems.push(`assignments[${i}]: building coverage without a building`);
      } else if (!buildingKeys.has(`${building.street_name}|${building.house_number}`)) {
        problems.push(`assignments[${i}]: unknown building ${building.street_name} ${building.house_number}`);
      }
    }
  });

  return problems;
}

export function loadSeedData(dataDir: string): SeedData {
  const categories = readJson(path.join(dataDir, 'categories.json'));
  const services = readJson(path.join(dataDir, 'services.json'));

  if (!validateCategories(categories)) {
    throw new Error(`Invalid seed data:\n${formatErrors('categories.json', validateCategories.errors).join('\n')}`);
  }
  if (!validateServices(services)) {
    throw new Error(`Invalid seed data:\n${formatErrors('services.json', validateServices.errors).join('\n')}`);
  }

  const data: SeedData = { ...categories, ...services };
  const referenceProblems = checkReferences(data);
  if (referenceProblems.length > 0) {
    throw new Error(`Invalid seed data:\n${referenceProblems.join('\n')}`);
  }
  return data;
}
