/**
 * Request/Response Contract Tests
 *
 * Payloads against the JSON schemas in docs/contracts/.
 */

import {
  RequestValidationError,
  parseContract,
  validateContract,
} from '@civic-appeals/shared';

describe('request contracts', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('accepts a classify request', () => {
    expect(parseContract('classify_request', { problem_text: 'Немає води' })).toEqual({
      problem_text: 'Немає води',
    });
  });

  it('rejects a blank problem text', () => {
    expect(validateContract('classify_request', { problem_text: '   ' })).toEqual({
      valid: false,
      errors: ['/problem_text: must match pattern "\\S"'],
    });
  });

  it('throws RequestValidationError listing every violation', () => {
    let thrown: unknown;
    try {
      parseContract('resolve_service_request', { category_id: 'roads', is_urgent: 'yes', street_name: 'Городоцька' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(RequestValidationError);
    if (thrown instanceof RequestValidationError) {
      expect(thrown.message).toBe('Request does not match resolve_service_request');
      expect(thrown.errors).toEqual(
        expect.arrayContaining([
          "/: must have required property 'house_number'",
          '/is_urgent: must be boolean',
        ])
      );
    }
  });

  it('rejects unknown fields', () => {
    const result = validateContract('appeal_request', {
      problem_text: 'Яма',
      address: 'Городоцька',
      building: '15',
      priority: 'high',
    });

    expect(result).toEqual({ valid: false, errors: ['/: must NOT have additional properties'] });
  });

  it('accepts a solve request with nullable personal fields', () => {
    const result = validateContract('solve_request', {
      user_info: { name: null, address: 'вул. Стрийська, 45', phone: null },
      problem_text: 'Немає води',
    });

    expect(result).toEqual({ valid: true });
  });
});

describe('response contracts', () => {
  it('accepts a sentinel resolution with zero confidence', () => {
    const result = validateContract('service_resolution', {
      category_id: 'noise',
      category_name: 'noise',
      is_urgent: false,
      resolution_level: 'integrity_failure',
      service_type: 'emergency_dispatch',
      service_name: 'Невідома служба',
      service_phone: '1580',
      service_email: null,
      service_address: null,
      service_website: null,
      confidence: 0,
      reasoning: 'x',
    });

    expect(result).toEqual({ valid: true });
  });
});
