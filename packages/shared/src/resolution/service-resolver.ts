/**
 * Service Resolver
 *
 * Maps (category, urgency, address) to the responsible organization. Levels are
 * tried in order and the first match wins:
 *
 * 1. Emergency service for urgent problems (no address lookup)
 * 2. Building manager assigned to the resolved building
 * 3. District administration of the building's district
 * 4. Citywide monopolist
 * 5. City hotline, or a zero-confidence sentinel when the hotline is missing
 */

import { logger } from '../logger';
import { resolutionsCounter } from '../metrics';
import { getResolutionConfidence } from '../resolution-confidence';
import type { ReferenceStore } from '../store/types';
import type { Building, ResolutionLevel, ResolveServiceRequest, Service, ServiceResolution } from '../types';
import { matchBuilding, normalizeDistrictName, streetSearchTokens } from './address-matching';
import { DEFAULT_ROUTING_POLICY, type RoutingPolicy } from './policy';

interface ResolutionSubject {
  category_id: string;
  category_name: string;
  is_urgent: boolean;
}

export class ServiceResolver {
  constructor(
    private readonly store: ReferenceStore,
    private readonly policy: RoutingPolicy = DEFAULT_ROUTING_POLICY
  ) {}

  async resolve(request: ResolveServiceRequest): Promise<ServiceResolution> {
    const { category_id: categoryId, is_urgent: isUrgent, street_name: street, house_number: house } = request;

    const category = await this.store.getCategory(categoryId);
    const subject: ResolutionSubject = {
      category_id: categoryId,
      category_name: category?.name ?? categoryId,
      is_urgent: isUrgent,
    };

    // Looked up on first need only
    let buildingLookup: Promise<Building | null> | undefined;
    const building = (): Promise<Building | null> => {
      if (!buildingLookup) {
        buildingLookup = this.findBuilding(street, house);
      }
      return buildingLookup;
    };

    let resolution: ServiceResolution;

    if (isUrgent) {
      const [emergency] = await this.store.findServiceAssignments({ categoryId, isEmergency: true });
      resolution = emergency
        ? this.toResolution(
            subject,
            'emergency',
            emergency.service,
            `Пріоритет: знайдено аварійну службу ${emergency.service.name} для термінової проблеми '${categoryId}'.`
          )
        : await this.hotline(subject);
    } else {
      resolution = (await this.resolveNonUrgent(subject, street, house, building)) ?? (await this.hotline(subject));
    }

    resolutionsCounter.inc({ level: resolution.resolution_level });
    logger.info('Service resolved', {
      category_id: categoryId,
      is_urgent: isUrgent,
      resolution_level: resolution.resolution_level,
      service_name: resolution.service_name,
    });

    return resolution;
  }

  private async resolveNonUrgent(
    subject: ResolutionSubject,
    street: string,
    house: string,
    building: () => Promise<Building | null>
  ): Promise<ServiceResolution | null> {
    const categoryId = subject.category_id;
    const isDistrictCategory = this.policy.districtCategories.includes(categoryId);
    const isCitywideCategory = this.policy.citywideCategories.includes(categoryId);

    if (!isDistrictCategory && !isCitywideCategory) {
      const found = await building();
      if (found) {
        const [manager] = await this.store.findServiceAssignments({
          categoryId,
          buildingId: found.id,
          primaryOnly: true,
          serviceTypes: this.policy.buildingServiceTypes,
        });
        if (manager) {
          return this.toResolution(
            subject,
            'building',
            manager.service,
            `Адресна прив'язка: будинок ${house} на вул. ${street} обслуговується ${manager.service.name}.`
          );
        }
      }
    }

    if (isDistrictCategory) {
      const found = await building();
      if (found?.district && found.district !== this.policy.unknownDistrict) {
        const [districtAdmin] = await this.store.findServiceAssignments({
          categoryId,
          serviceTypes: this.policy.districtServiceTypes,
          serviceNameContains: normalizeDistrictName(found.district),
        });
        if (districtAdmin) {
          return this.toResolution(
            subject,
            'district',
            districtAdmin.service,
            `Районний рівень: проблема '${categoryId}' на вул. ${street} належить до юрисдикції ${districtAdmin.service.name}.`
          );
        }
      }
    }

    if (isCitywideCategory) {
      const [monopolist] = await this.store.findServiceAssignments({
        categoryId,
        coverageLevel: 'citywide',
        serviceTypes: this.policy.citywideServiceTypes,
      });
      if (monopolist) {
        return this.toResolution(
          subject,
          'citywide',
          monopolist.service,
          `Міський монополіст: проблема '${categoryId}' є загальноміською та обслуговується ${monopolist.service.name}.`
        );
      }
    }

    return null;
  }

  private async findBuilding(street: string, house: string): Promise<Building | null> {
    const tokens = streetSearchTokens(street);
    if (tokens.length === 0) {
      return null;
    }

    const candidates = await this.store.findBuildingsByStreetTokens(this.policy.city, tokens);
    const building = matchBuilding(candidates, house);

    logger.debug('Building lookup', {
      tokens,
      candidates: candidates.length,
      building_id: building?.id ?? null,
    });
    return building;
  }

  private async hotline(subject: ResolutionSubject): Promise<ServiceResolution> {
    const hotline = await this.store.findServiceByName(this.policy.hotlineServiceName);

    if (!hotline) {
      logger.error(
        'Hotline service missing from registry',
        new Error(`Service "${this.policy.hotlineServiceName}" not found`)
      );
      return {
        ...subject,
        resolution_level: 'integrity_failure',
        service_type: 'emergency_dispatch',
        service_name: this.policy.sentinelServiceName,
        service_phone: this.policy.sentinelPhone,
        service_email: null,
        service_address: null,
        service_website: null,
        confidence: getResolutionConfidence('integrity_failure'),
        reasoning: `Критична помилка цілісності даних: службу "${this.policy.hotlineServiceName}" не знайдено в реєстрі.`,
      };
    }

    const reasoning = subject.is_urgent
      ? `Терміново: спеціальну аварійну службу для цієї проблеми не знайдено. Звернення передано на ${hotline.name} для ручної диспетчеризації.`
      : `Проблему не закріплено за жодним спеціалізованим виконавцем. Звернення передано на ${hotline.name} для ручної диспетчеризації.`;

    return this.toResolution(subject, 'hotline', hotline, reasoning);
  }

  private toResolution(
    subject: ResolutionSubject,
    level: ResolutionLevel,
    service: Service,
    reasoning: string
  ): ServiceResolution {
    return {
      ...subject,
      resolution_level: level,
      service_type: service.type,
      service_name: service.name,
      service_phone: service.contacts.phone,
      service_email: service.contacts.email,
      service_address: service.contacts.legal_address,
      service_website: service.contacts.website,
      confidence: getResolutionConfidence(level),
      reasoning,
    };
  }
}
