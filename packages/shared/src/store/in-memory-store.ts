/**
 * Reference store over an in-memory snapshot. Used by tests and local runs
 * without a database.
 */

import type { Building, Category, Service } from '../types';
import { InMemoryExampleIndex } from '../retrieval/in-memory-index';
import type { ExampleFilter, ExampleIndex, ScoredExample } from '../retrieval/types';
import {
  compareAssignments,
  type AssignedService,
  type AssignmentQuery,
  type ReferenceData,
  type ReferenceStore,
} from './types';

export class InMemoryReferenceStore implements ReferenceStore, ExampleIndex {
  private readonly servicesById: Map<number, Service>;
  private readonly index: InMemoryExampleIndex;

  constructor(private readonly data: ReferenceData) {
    this.servicesById = new Map(data.services.map((service) => [service.id, service]));
    this.index = new InMemoryExampleIndex(data.examples);
  }

  async nearest(embedding: number[], k: number, filter?: ExampleFilter): Promise<ScoredExample[]> {
    return this.index.nearest(embedding, k, filter);
  }

  async listCategories(): Promise<Category[]> {
    return [...this.data.categories];
  }

  async getCategory(id: string): Promise<Category | null> {
    return this.data.categories.find((category) => category.id === id) ?? null;
  }

  async findServiceByName(name: string): Promise<Service | null> {
    return this.data.services.find((service) => service.name === name) ?? null;
  }

  async findBuildingsByStreetTokens(city: string, tokens: readonly string[]): Promise<Building[]> {
    const needles = tokens.map((token) => token.toLowerCase()).filter((token) => token.length > 0);
    if (needles.length === 0) {
      return [];
    }

    return this.data.buildings
      .filter((building) => building.city === city)
      .filter((building) => {
        const street = building.street_name.toLowerCase();
        return needles.some((needle) => street.includes(needle));
      })
      .sort((a, b) => a.id - b.id);
  }

  async findServiceAssignments(query: AssignmentQuery): Promise<AssignedService[]> {
    const nameNeedle = query.serviceNameContains?.toLowerCase();
    const matches: AssignedService[] = [];

    for (const assignment of this.data.assignments) {
      if (assignment.category_id !== query.categoryId) continue;
      if (query.coverageLevel !== undefined && assignment.coverage_level !== query.coverageLevel) continue;
      if (query.buildingId !== undefined && assignment.building_id !== query.buildingId) continue;
      if (query.primaryOnly && !assignment.is_primary) continue;

      const service = this.servicesById.get(assignment.service_id);
      if (!service) continue;
      if (query.isEmergency !== undefined && service.is_emergency !== query.isEmergency) continue;
      if (query.serviceTypes && !query.serviceTypes.includes(service.type)) continue;
      if (nameNeedle !== undefined && !service.name.toLowerCase().includes(nameNeedle)) continue;

      matches.push({ service, assignment });
    }

    return matches.sort((a, b) => compareAssignments(a.assignment, b.assignment));
  }
}
