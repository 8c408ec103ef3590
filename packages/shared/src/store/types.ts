import type {
  Building,
  Category,
  CoverageLevel,
  Example,
  Service,
  ServiceAssignment,
  ServiceType,
} from '../types';

/**
 * Filters for an assignment lookup. Every given field must match.
 */
export interface AssignmentQuery {
  categoryId: string;
  isEmergency?: boolean;
  serviceTypes?: readonly ServiceType[];
  coverageLevel?: CoverageLevel;
  buildingId?: number;
  primaryOnly?: boolean;
  /** Case-insensitive substring of the service name */
  serviceNameContains?: string;
}

export interface AssignedService {
  service: Service;
  assignment: ServiceAssignment;
}

/**
 * Read access to routing reference data.
 */
export interface ReferenceStore {
  listCategories(): Promise<Category[]>;
  getCategory(id: string): Promise<Category | null>;
  findServiceByName(name: string): Promise<Service | null>;
  /**
   * Buildings in `city` whose street name contains any of the tokens
   * (case-insensitive), ordered by id.
   */
  findBuildingsByStreetTokens(city: string, tokens: readonly string[]): Promise<Building[]>;
  /** Matching assignments, primary first, then by ascending assignment id */
  findServiceAssignments(query: AssignmentQuery): Promise<AssignedService[]>;
}

/** Complete reference data set, as seeded */
export interface ReferenceData {
  categories: Category[];
  examples: Example[];
  services: Service[];
  buildings: Building[];
  assignments: ServiceAssignment[];
}

export function compareAssignments(a: ServiceAssignment, b: ServiceAssignment): number {
  if (a.is_primary !== b.is_primary) {
    return a.is_primary ? -1 : 1;
  }
  return a.id - b.id;
}
