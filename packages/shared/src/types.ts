/**
 * Shared TypeScript Types
 *
 * Reference entities, classification and routing contracts. Wire-facing shapes
 * use snake_case and match the JSON schemas in docs/contracts/.
 */

// ============================================================================
// Reference Data
// ============================================================================

/** Pseudo-category used for every unclassifiable complaint. */
export const OTHER_CATEGORY_ID = 'other';

export interface Category {
  id: string;
  name: string;
  description: string;
}

export interface Example {
  id: number;
  category_id: string;
  text: string;
  is_urgent: boolean;
  embedding: number[];
}

export const SERVICE_TYPES = [
  'emergency_dispatch',
  'city_monopoly',
  'district_admin',
  'building_manager',
] as const;

export type ServiceType = (typeof SERVICE_TYPES)[number];

export interface ServiceContacts {
  phone: string | null;
  email: string | null;
  legal_address: string | null;
  website: string | null;
}

export interface Service {
  id: number;
  name: string;
  type: ServiceType;
  contacts: ServiceContacts;
  is_emergency: boolean;
}

export interface Building {
  id: number;
  city: string;
  district: string | null;
  street_name: string;
  house_number: string;
}

export const COVERAGE_LEVELS = ['building', 'district', 'citywide'] as const;

export type CoverageLevel = (typeof COVERAGE_LEVELS)[number];

export function toServiceType(value: string): ServiceType | undefined {
  return SERVICE_TYPES.find((type) => type === value);
}

export function toCoverageLevel(value: string): CoverageLevel | undefined {
  return COVERAGE_LEVELS.find((level) => level === value);
}

export interface ServiceAssignment {
  id: number;
  service_id: number;
  category_id: string;
  building_id: number | null;
  coverage_level: CoverageLevel;
  is_primary: boolean;
}

// ============================================================================
// Classification
// ============================================================================

export interface ClassificationResponse {
  category_id: string;
  category_name: string;
  category_description: string;
  confidence: number;
  reasoning: string;
  is_urgent: boolean;
  is_relevant?: boolean;
}

// ============================================================================
// Service Resolution
// ============================================================================

export type ResolutionLevel =
  | 'emergency'
  | 'building'
  | 'district'
  | 'citywide'
  | 'hotline'
  | 'integrity_failure';

export interface ServiceResolution {
  category_id: string;
  category_name: string;
  is_urgent: boolean;
  resolution_level: ResolutionLevel;
  service_type: string;
  service_name: string;
  service_phone: string | null;
  service_email: string | null;
  service_address: string | null;
  service_website: string | null;
  confidence: number;
  reasoning: string;
}

export interface ResolveServiceRequest {
  category_id: string;
  is_urgent: boolean;
  street_name: string;
  house_number: string;
}

// ============================================================================
// Appeals & Orchestration
// ============================================================================

export interface PersonalInfo {
  name?: string | null;
  address?: string | null;
  city?: string | null;
  phone?: string | null;
  apartment?: string | null;
}

export interface AppealRequest {
  problem_text: string;
  /** Street name where the problem occurred */
  address: string;
  building: string;
  apartment?: string;
}

export interface AppealResponse {
  letter_text: string;
}

export interface ClassifyRequest {
  problem_text: string;
}

export interface SolveRequest {
  user_info: PersonalInfo;
  problem_text: string;
}

export interface SolveResponse {
  user_info: PersonalInfo;
  classification: ClassificationResponse;
  service: ServiceResolution;
  appeal_text: string;
}

// ============================================================================
// API Envelopes
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: 'validation_error' | 'upstream_error' | 'internal_error' | 'not_found';
    message: string;
    correlation_id: string;
    details?: string[];
  };
}
