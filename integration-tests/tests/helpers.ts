/**
 * Test Helpers
 *
 * In-process fakes for the embedding and text-generation clients, and a small
 * Lviv reference data set for the in-memory store.
 */

import {
  InMemoryReferenceStore,
  UpstreamCapabilityError,
  type Building,
  type Category,
  type EmbeddingClient,
  type Example,
  type ReferenceData,
  type Service,
  type ServiceAssignment,
  type ServiceType,
  type SessionStore,
  type StoreSession,
  type TextGenerator,
} from '@civic-appeals/shared';

/**
 * Embeds by lookup: known texts get their vector, everything else the fallback.
 */
export class FakeEmbedder implements EmbeddingClient {
  readonly model = 'fake-embedding';
  readonly calls: string[] = [];

  constructor(
    private readonly vectors: Record<string, number[]> = {},
    private readonly fallback: number[] = [1, 0, 0]
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return text in this.vectors ? this.vectors[text] : this.fallback;
  }
}

/**
 * Returns a canned completion (or one computed from the prompt) and records
 * every call.
 */
export class FakeTextGenerator implements TextGenerator {
  readonly model = 'fake-text';
  readonly prompts: string[] = [];
  readonly temperatures: number[] = [];

  constructor(private readonly reply: string | ((prompt: string) => string)) {}

  async generate(prompt: string, temperature: number): Promise<string> {
    this.prompts.push(prompt);
    this.temperatures.push(temperature);
    return typeof this.reply === 'string' ? this.reply : this.reply(prompt);
  }
}

/**
 * Session runner over an in-memory store that counts open and total sessions,
 * standing in for checked-out pool clients.
 */
export class CountingSession {
  open = 0;
  opened = 0;
  readonly run: StoreSession;

  constructor(store: SessionStore) {
    this.run = async (fn) => {
      this.open++;
      this.opened++;
      try {
        return await fn(store);
      } finally {
        this.open--;
      }
    };
  }
}

export class FailingTextGenerator implements TextGenerator {
  readonly model = 'failing-text';
  calls = 0;

  async generate(): Promise<string> {
    this.calls++;
    throw new UpstreamCapabilityError('generation', 'empty_completion', 'Empty completion from provider');
  }
}

// ============================================================================
// Reference data
// ============================================================================

export const CATEGORIES: Category[] = [
  { id: 'other', name: 'Uncategorized', description: 'Could not determine specific category' },
  { id: 'water_supply', name: 'Водопостачання', description: 'Відсутність води, прориви водогону' },
  { id: 'heating', name: 'Опалення', description: 'Відсутність або недостатнє опалення' },
  { id: 'gas', name: 'Газопостачання', description: 'Запах газу, перебої з газом' },
  { id: 'lighting', name: 'Вуличне освітлення', description: 'Непрацюючі ліхтарі' },
  { id: 'roads', name: 'Дороги та тротуари', description: 'Ями, пошкоджене покриття' },
  { id: 'yard', name: 'Прибудинкова територія', description: 'Прибирання двору' },
  { id: 'property_mgmt', name: 'Утримання будинку', description: 'Ліфти, дах, під\'їзди' },
];

export const HOTLINE_NAME = 'Міська гаряча лінія 1580';

export function makeExample(
  id: number,
  categoryId: string,
  embedding: number[],
  isUrgent: boolean = false,
  text: string = `example ${id}`
): Example {
  return { id, category_id: categoryId, text, is_urgent: isUrgent, embedding };
}

export function makeService(
  id: number,
  name: string,
  type: ServiceType,
  isEmergency: boolean = false,
  phone: string | null = null
): Service {
  return {
    id,
    name,
    type,
    contacts: { phone, email: null, legal_address: null, website: null },
    is_emergency: isEmergency,
  };
}

export const SERVICES: Service[] = [
  makeService(1, HOTLINE_NAME, 'emergency_dispatch', false, '1580'),
  makeService(2, 'Аварійна служба Водоканалу', 'emergency_dispatch', true, '+380322388700'),
  makeService(3, 'КП "Львівсвітло"', 'city_monopoly', false, '+380322975111'),
  makeService(4, 'ЛМКП "Львівводоканал"', 'city_monopoly'),
  makeService(5, 'Залізнична районна адміністрація', 'district_admin'),
  makeService(6, 'Шевченківська районна адміністрація', 'district_admin'),
  makeService(7, 'ОСББ "Затишок на Шевченка"', 'building_manager'),
  makeService(8, 'ЛКП "Резервне"', 'building_manager'),
];

export const BUILDINGS: Building[] = [
  { id: 1, city: 'Львів', district: 'Шевченківський', street_name: 'Шевченка', house_number: '12' },
  { id: 2, city: 'Львів', district: 'Залізничний', street_name: 'Городоцька', house_number: '15' },
  { id: 3, city: 'Львів', district: 'Невідомий', street_name: 'Окружна', house_number: '7' },
  { id: 4, city: 'Львів', district: 'Залізничний', street_name: 'Городоцька', house_number: '15А' },
  { id: 5, city: 'Київ', district: null, street_name: 'Шевченка', house_number: '12' },
];

export const ASSIGNMENTS: ServiceAssignment[] = [
  { id: 1, service_id: 1, category_id: 'other', building_id: null, coverage_level: 'citywide', is_primary: true },
  { id: 2, service_id: 2, category_id: 'water_supply', building_id: null, coverage_level: 'citywide', is_primary: true },
  { id: 3, service_id: 4, category_id: 'water_supply', building_id: null, coverage_level: 'citywide', is_primary: true },
  { id: 4, service_id: 3, category_id: 'lighting', building_id: null, coverage_level: 'citywide', is_primary: true },
  { id: 5, service_id: 5, category_id: 'roads', building_id: null, coverage_level: 'district', is_primary: true },
  { id: 6, service_id: 6, category_id: 'roads', building_id: null, coverage_level: 'district', is_primary: true },
  { id: 7, service_id: 7, category_id: 'property_mgmt', building_id: 1, coverage_level: 'building', is_primary: true },
  { id: 8, service_id: 8, category_id: 'property_mgmt', building_id: 1, coverage_level: 'building', is_primary: false },
  { id: 9, service_id: 6, category_id: 'yard', building_id: null, coverage_level: 'district', is_primary: true },
];

export function buildReferenceData(overrides: Partial<ReferenceData> = {}): ReferenceData {
  return {
    categories: CATEGORIES,
    examples: [],
    services: SERVICES,
    buildings: BUILDINGS,
    assignments: ASSIGNMENTS,
    ...overrides,
  };
}

export function buildStore(overrides: Partial<ReferenceData> = {}): InMemoryReferenceStore {
  return new InMemoryReferenceStore(buildReferenceData(overrides));
}
