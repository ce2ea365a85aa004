import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ApiError, constraintsToQuery, fetchCities, fetchComparison, fetchDashboard, fetchDictionary, fetchFilterOptions, setApiBase,
} from '../services/api';
import type { Constraints } from '../types';

const constraints: Constraints = {
  provinces: ['Ontario', 'Nova Scotia'],
  cities: ['Toronto'],
  price: { min: 200000, max: 1000000 },
  minBeds: 3,
  minBaths: 2,
};

function respond(status: number, body: unknown) {
  return vi.fn().mockResolvedValue({
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(body),
  });
}

// Don't mock api — test the actual module logic
describe('API service', () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
    setApiBase('/api');
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  describe('constraintsToQuery', () => {
    it('repeats list params and keeps numeric bounds', () => {
      expect(constraintsToQuery(constraints)).toBe(
        'province=Ontario&province=Nova+Scotia&city=Toronto&minPrice=200000&maxPrice=1000000&minBeds=3&minBaths=2',
      );
    });
  });

  describe('get', () => {
    it('unwraps the data envelope', async () => {
      const fetchMock = respond(200, { success: true, data: [{ variable: 'City', description: 'City name' }] });
      globalThis.fetch = fetchMock;

      const result = await fetchDictionary();
      expect(result).toEqual([{ variable: 'City', description: 'City name' }]);
      expect(fetchMock).toHaveBeenCalledWith('/api/dictionary');
    });

    it('requests the filter options', async () => {
      const fetchMock = respond(200, { success: true, data: { provinces: ['Ontario'] } });
      globalThis.fetch = fetchMock;

      const result = await fetchFilterOptions();
      expect(result.provinces).toEqual(['Ontario']);
      expect(fetchMock).toHaveBeenCalledWith('/api/filters');
    });

    it('sends constraints as query params for the dashboard', async () => {
      const fetchMock = respond(200, { success: true, data: { total: 0 } });
      globalThis.fetch = fetchMock;

      await fetchDashboard(constraints);
      expect(fetchMock).toHaveBeenCalledWith(`/api/dashboard?${constraintsToQuery(constraints)}`);
    });

    it('asks for the cities of the selected provinces', async () => {
      const fetchMock = respond(200, { success: true, data: { available: ['Halifax'], selected: ['Halifax'] } });
      globalThis.fetch = fetchMock;

      const result = await fetchCities(['Nova Scotia']);
      expect(result.selected).toEqual(['Halifax']);
      expect(fetchMock).toHaveBeenCalledWith('/api/cities?province=Nova+Scotia');
    });

    it('passes the current city selection along', async () => {
      const fetchMock = respond(200, { success: true, data: { available: ['Toronto'], selected: ['Toronto'] } });
      globalThis.fetch = fetchMock;

      await fetchCities(['Ontario'], ['Toronto', 'Halifax']);
      expect(fetchMock).toHaveBeenCalledWith('/api/cities?province=Ontario&city=Toronto&city=Halifax');
    });

    it('throws ApiError with the server code on failure', async () => {
      globalThis.fetch = respond(422, {
        success: false,
        error: 'Please select exactly two cities for comparison.',
        code: 'INVALID_COMPARISON',
      });

      const err = await fetchComparison(['Toronto']).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ status: 422, code: 'INVALID_COMPARISON', message: 'Please select exactly two cities for comparison.' });
    });

    it('falls back to the status when the body is not JSON', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue({
        ok: false,
        status: 503,
        json: () => Promise.reject(new SyntaxError('Unexpected token')),
      });

      await expect(fetchFilterOptions()).rejects.toThrow('API 503');
    });

    it('honours a custom base without a trailing slash', async () => {
      const fetchMock = respond(200, { success: true, data: [] });
      globalThis.fetch = fetchMock;
      setApiBase('http://localhost:4000/api/');

      await fetchDictionary();
      expect(fetchMock).toHaveBeenCalledWith('http://localhost:4000/api/dictionary');
    });
  });
});
