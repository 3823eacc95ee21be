import { describe, it, expect, beforeEach } from 'vitest';
import { DataSourcesServiceImpl } from '../service.js';
import { createTestContext, jsonResponse, type TestContext } from '../../../__mocks__/index.js';

const SOURCES = [
  { id: 'ds-1', alias: 'workers', descriptor: 'All Workers', businessObject: { id: 'bo-1', descriptor: 'Worker' } },
  { id: 'ds-2', alias: 'orgs', descriptor: 'All Organizations', businessObject: { id: 'bo-2', descriptor: 'Organization' } },
  { id: 'ds-3', alias: 'orgsActive', descriptor: 'Active Organizations', businessObject: { id: 'bo-2', descriptor: 'Organization' } },
];

describe('DataSourcesServiceImpl', () => {
  let test: TestContext;
  let service: DataSourcesServiceImpl;

  beforeEach(() => {
    test = createTestContext();
    service = new DataSourcesServiceImpl(test.context);
    test.http.on('GET', '/dataSources', jsonResponse(200, { total: SOURCES.length, data: SOURCES }));
  });

  it('should read data sources from the WQL endpoint', async () => {
    const sources = await service.list();

    expect(sources.total).toBe(3);
    expect(test.http.calls('GET')[0].url).toBe('https://prism.test/api/wql/v1/acme/dataSources');
  });

  it('should search descriptors and aliases', async () => {
    const sources = await service.list({ search: 'orgs' });

    expect(sources.data.map((source) => source.id)).toEqual(['ds-2', 'ds-3']);
  });

  it('should resolve a business object with exactly one data source', async () => {
    expect(await service.findBusinessObject('Worker')).toEqual({ id: 'bo-1', descriptor: 'Worker' });
  });

  it('should return undefined for ambiguous or unknown business objects', async () => {
    expect(await service.findBusinessObject('Organization')).toBeUndefined();
    expect(await service.findBusinessObject('Position')).toBeUndefined();
    expect(test.logger.warn).toHaveBeenCalledWith('Business object Organization not found', { matches: 2 });
  });

  it('should read the list once for repeated lookups', async () => {
    await service.findBusinessObject('Worker');
    await service.findBusinessObject('Organization');

    expect(test.http.calls('GET')).toHaveLength(1);
  });
});
