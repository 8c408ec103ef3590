export { ServiceResolver } from './service-resolver';
export { DEFAULT_ROUTING_POLICY, routingPolicyFromConfig, type RoutingPolicy } from './policy';
export {
  streetSearchTokens,
  normalizeHouseNumber,
  matchBuilding,
  normalizeDistrictName,
} from './address-matching';
