/**
 * Routing Policy
 *
 * Which categories are handled at which level of the resolution hierarchy and
 * which service types qualify there.
 */

import { config, type Config } from '../config';
import type { ServiceType } from '../types';

export interface RoutingPolicy {
  city: string;
  /** Categories owned by district administrations (roads, trees, ...) */
  districtCategories: readonly string[];
  /** Categories owned by citywide monopolists (water, heating, ...) */
  citywideCategories: readonly string[];
  buildingServiceTypes: readonly ServiceType[];
  districtServiceTypes: readonly ServiceType[];
  citywideServiceTypes: readonly ServiceType[];
  hotlineServiceName: string;
  /** District value meaning "not known" in the building registry */
  unknownDistrict: string;
  /** Returned when the hotline itself is missing from the registry */
  sentinelServiceName: string;
  sentinelPhone: string;
}

export function routingPolicyFromConfig(cfg: Config = config): RoutingPolicy {
  return {
    city: cfg.city,
    districtCategories: ['roads', 'trees', 'yard', 'infrastructure'],
    citywideCategories: ['water_supply', 'heating', 'gas', 'lighting'],
    buildingServiceTypes: ['building_manager'],
    districtServiceTypes: ['district_admin'],
    citywideServiceTypes: ['city_monopoly'],
    hotlineServiceName: cfg.hotlineServiceName,
    unknownDistrict: 'Невідомий',
    sentinelServiceName: 'Невідома служба',
    sentinelPhone: '1580',
  };
}

export const DEFAULT_ROUTING_POLICY: RoutingPolicy = routingPolicyFromConfig();
