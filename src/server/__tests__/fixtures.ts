import { vi } from 'vitest';
import { Server } from '../Server';
import { ServerConfigInput } from '../../core/config';

export const SITE_URL = 'http://test-server/api/2.4/sites/site-1';
export const DATASOURCES_URL = `${SITE_URL}/datasources`;

export const DATASOURCES_PAGE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<tsResponse xmlns="http://tableau.com/api">
  <pagination pageNumber="1" pageSize="100" totalAvailable="2"/>
  <datasources>
    <datasource id="ds-1" name="Sales" contentUrl="Sales" type="excel-direct" createdAt="2016-08-11T21:22:40Z" updatedAt="2016-08-11T21:34:17Z">
      <project id="proj-1" name="Default"/>
      <owner id="user-1"/>
      <tags/>
    </datasource>
    <datasource id="ds-2" name="Finance" contentUrl="Finance" type="sqlserver" createdAt="2016-08-04T21:31:55Z" updatedAt="2016-08-04T21:31:55Z">
      <project id="proj-2" name="Finance"/>
      <owner id="user-2"/>
      <tags>
        <tag label="monthly"/>
        <tag label="finance"/>
      </tags>
    </datasource>
  </datasources>
</tsResponse>`;

export function singleDatasourceXml(id: string, name: string, projectId: string = 'proj-1'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<tsResponse xmlns="http://tableau.com/api">
  <datasource id="${id}" name="${name}" contentUrl="${name}" type="sqlserver">
    <project id="${projectId}" name="Default"/>
    <owner id="user-1"/>
    <tags/>
  </datasource>
</tsResponse>`;
}

export function pageXml(ids: string[], totalAvailable: number, pageNumber: number, pageSize: number): string {
  const items = ids
    .map(id => `<datasource id="${id}" name="${id}"><project id="proj-1"/><owner id="user-1"/></datasource>`)
    .join('');
  return `<tsResponse><pagination pageNumber="${pageNumber}" pageSize="${pageSize}" totalAvailable="${totalAvailable}"/><datasources>${items}</datasources></tsResponse>`;
}

export const CONNECTIONS_XML = `<?xml version="1.0" encoding="UTF-8"?>
<tsResponse xmlns="http://tableau.com/api">
  <connections>
    <connection id="conn-1" type="postgres" serverAddress="db.internal" serverPort="5432" userName="analyst" embedPassword="true"/>
  </connections>
</tsResponse>`;

export function fileUploadXml(uploadSessionId: string, fileSize: number = 0): string {
  return `<tsResponse><fileUpload uploadSessionId="${uploadSessionId}" fileSize="${fileSize}"/></tsResponse>`;
}

export function errorXml(code: string, summary: string, detail: string): string {
  return `<tsResponse><error code="${code}"><summary>${summary}</summary><detail>${detail}</detail></error></tsResponse>`;
}

export function xmlResponse(body: string, init: ResponseInit = {}): Response {
  return new Response(body, { status: 200, ...init });
}

export function createServer(overrides: Partial<ServerConfigInput> = {}): Server {
  return new Server({
    serverAddress: 'http://test-server',
    siteId: 'site-1',
    authToken: 'test-token',
    retry: { maxRetries: 0, baseDelay: 0 },
    ...overrides
  });
}

/**
 * Replaces global fetch with a mock for the duration of a test
 */
export function stubFetch() {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string;
}

/**
 * Reads back the arguments of the n-th fetch call
 */
export function requestAt(fetchMock: ReturnType<typeof stubFetch>, index: number): RecordedRequest {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${fetchMock.mock.calls.length} times, expected call #${index + 1}`);
  }

  const [input, init] = call;
  const body = init?.body;
  return {
    url: String(input),
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
    body: typeof body === 'string' ? body : Buffer.isBuffer(body) ? body.toString('utf8') : ''
  };
}
