import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  AuthenticationError,
  FileNotFoundError,
  InvalidConfigError,
  MissingRequiredFieldError,
  NotFoundError,
  ResponseParseError,
  ServerResponseError,
  TimeoutError,
  ValidationError
} from '../../core/errors';
import { DatasourceItem } from '../../models/DatasourceItem';
import { PublishMode } from '../../models/PublishMode';
import { RequestOptions } from '../../models/RequestOptions';
import { parseXml } from '../../utils/xmlUtils';
import {
  CONNECTIONS_XML,
  DATASOURCES_PAGE_XML,
  DATASOURCES_URL,
  SITE_URL,
  createServer,
  errorXml,
  fileUploadXml,
  pageXml,
  requestAt,
  singleDatasourceXml,
  stubFetch,
  xmlResponse
} from './fixtures';

describe('DatasourcesEndpoint', () => {
  let fetchMock: ReturnType<typeof stubFetch>;
  let tempDir: string;

  beforeEach(async () => {
    fetchMock = stubFetch();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'datasources-test-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('get', () => {
    it('should return the datasources and pagination of the page', async () => {
      fetchMock.mockResolvedValue(xmlResponse(DATASOURCES_PAGE_XML));
      const server = createServer();

      const [items, pagination] = await server.datasources.get();

      const request = requestAt(fetchMock, 0);
      expect(request.url).toBe(DATASOURCES_URL);
      expect(request.method).toBe('GET');
      expect(request.headers.get('X-Tableau-Auth')).toBe('test-token');

      expect(pagination.pageNumber).toBe(1);
      expect(pagination.pageSize).toBe(100);
      expect(pagination.totalAvailable).toBe(2);

      expect(items.map(item => item.id)).toEqual(['ds-1', 'ds-2']);
      expect(items[0].name).toBe('Sales');
      expect(items[0].datasourceType).toBe('excel-direct');
      expect(items[0].projectId).toBe('proj-1');
      expect(items[0].projectName).toBe('Default');
      expect(items[0].ownerId).toBe('user-1');
      expect(items[0].createdAt?.toISOString()).toBe('2016-08-11T21:22:40.000Z');
      expect([...items[1].tags]).toEqual(['monthly', 'finance']);
    });

    it('should send paging, sorting and filtering as query parameters', async () => {
      fetchMock.mockResolvedValue(xmlResponse(DATASOURCES_PAGE_XML));
      const server = createServer();
      const options = new RequestOptions({ pageNumber: 3, pageSize: 2 })
        .addSort('name', 'desc')
        .addFilter('name', 'eq', 'Sales');

      await server.datasources.get(options);

      const url = new URL(requestAt(fetchMock, 0).url);
      expect(url.origin + url.pathname).toBe(DATASOURCES_URL);
      expect(url.searchParams.get('pageNumber')).toBe('3');
      expect(url.searchParams.get('pageSize')).toBe('2');
      expect(url.searchParams.get('sort')).toBe('name:desc');
      expect(url.searchParams.get('filter')).toBe('name:eq:Sales');
    });

    it('should accept plain request option objects', async () => {
      fetchMock.mockResolvedValue(xmlResponse(DATASOURCES_PAGE_XML));
      const server = createServer();

      await server.datasources.get({ pageSize: 10 });

      const url = new URL(requestAt(fetchMock, 0).url);
      expect(url.searchParams.get('pageSize')).toBe('10');
      expect(url.searchParams.get('pageNumber')).toBe('1');
    });

    it('should reject invalid options before sending anything', async () => {
      const server = createServer();

      await expect(server.datasources.get({ pageSize: 0 })).rejects.toBeInstanceOf(ValidationError);
      expect(() => server.datasources.all({ pageSize: 0 })).toThrow(ValidationError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should report a timeout while reading the body as a client timeout', async () => {
      const response = xmlResponse(DATASOURCES_PAGE_XML);
      vi.spyOn(response, 'arrayBuffer').mockRejectedValue(
        Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
      );
      fetchMock.mockResolvedValue(response);
      const server = createServer({ timeout: 50 });

      await expect(server.datasources.get()).rejects.toThrow(new TimeoutError('Request timed out after 50ms'));
    });

    it('should return no items for an empty site', async () => {
      fetchMock.mockResolvedValue(xmlResponse(
        '<tsResponse><pagination pageNumber="1" pageSize="100" totalAvailable="0"/><datasources/></tsResponse>'
      ));
      const server = createServer();

      const [items, pagination] = await server.datasources.get();

      expect(items).toEqual([]);
      expect(pagination.totalAvailable).toBe(0);
    });

    it('should fail without a site id', async () => {
      const server = createServer({ siteId: undefined });

      await expect(server.datasources.get()).rejects.toBeInstanceOf(InvalidConfigError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('all', () => {
    it('should fetch pages until every datasource was seen', async () => {
      fetchMock
        .mockResolvedValueOnce(xmlResponse(pageXml(['ds-1'], 2, 1, 1)))
        .mockResolvedValueOnce(xmlResponse(pageXml(['ds-2'], 2, 2, 1)));
      const server = createServer();

      const items = await server.datasources.all({ pageSize: 1 }).toArray();

      expect(items.map(item => item.id)).toEqual(['ds-1', 'ds-2']);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(new URL(requestAt(fetchMock, 0).url).searchParams.get('pageNumber')).toBe('1');
      expect(new URL(requestAt(fetchMock, 1).url).searchParams.get('pageNumber')).toBe('2');
    });

    it('should stop on an empty page', async () => {
      fetchMock.mockResolvedValueOnce(xmlResponse(pageXml([], 5, 1, 100)));
      const server = createServer();

      const items = await server.datasources.all().toArray();

      expect(items).toEqual([]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('getById', () => {
    it('should fetch a single datasource', async () => {
      fetchMock.mockResolvedValue(xmlResponse(singleDatasourceXml('ds-7', 'Inventory')));
      const server = createServer();

      const item = await server.datasources.getById('ds-7');

      expect(requestAt(fetchMock, 0).url).toBe(`${DATASOURCES_URL}/ds-7`);
      expect(item.id).toBe('ds-7');
      expect(item.name).toBe('Inventory');
    });

    it('should reject an empty id before any request', async () => {
      const server = createServer();

      await expect(server.datasources.getById('')).rejects.toThrow(
        new ValidationError('Datasource ID undefined.')
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should map a 404 with a server error body to NotFoundError', async () => {
      fetchMock.mockResolvedValue(xmlResponse(
        errorXml('404011', 'Resource Not Found', "Datasource 'missing' could not be found."),
        { status: 404, statusText: 'Not Found' }
      ));
      const server = createServer();

      const error = await server.datasources.getById('missing').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        status: 404,
        message: "Resource not found: Resource Not Found: Datasource 'missing' could not be found.",
        context: { code: '404011' }
      });
    });

    it('should map a 401 to AuthenticationError', async () => {
      fetchMock.mockResolvedValue(xmlResponse('', { status: 401, statusText: 'Unauthorized' }));
      const server = createServer();

      await expect(server.datasources.getById('ds-1')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('should retry a GET that failed with a server error', async () => {
      fetchMock
        .mockResolvedValueOnce(xmlResponse('', { status: 503, statusText: 'Service Unavailable' }))
        .mockResolvedValueOnce(xmlResponse(singleDatasourceXml('ds-1', 'Sales')));
      const server = createServer({ retry: { maxRetries: 1, baseDelay: 0 } });

      const item = await server.datasources.getById('ds-1');

      expect(item.name).toBe('Sales');
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('populateConnections', () => {
    it('should set the connections on the item', async () => {
      fetchMock.mockResolvedValue(xmlResponse(CONNECTIONS_XML));
      const server = createServer();
      const item = new DatasourceItem('proj-1', 'Sales');
      item.id = 'ds-1';

      await server.datasources.populateConnections(item);

      expect(requestAt(fetchMock, 0).url).toBe(`${DATASOURCES_URL}/ds-1/connections`);
      expect(item.connections).toHaveLength(1);
      expect(item.connections[0]).toMatchObject({
        id: 'conn-1',
        connectionType: 'postgres',
        serverAddress: 'db.internal',
        serverPort: '5432',
        username: 'analyst',
        embedPassword: true
      });
    });

    it('should reject an item without an id', async () => {
      const server = createServer();

      await expect(server.datasources.populateConnections(new DatasourceItem('proj-1')))
        .rejects.toBeInstanceOf(MissingRequiredFieldError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('delete', () => {
    it('should send a DELETE for the datasource', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
      const server = createServer();

      await server.datasources.delete('ds-1');

      const request = requestAt(fetchMock, 0);
      expect(request.method).toBe('DELETE');
      expect(request.url).toBe(`${DATASOURCES_URL}/ds-1`);
    });

    it('should reject an empty id', async () => {
      const server = createServer();

      await expect(server.datasources.delete('')).rejects.toBeInstanceOf(ValidationError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should not retry a failed DELETE', async () => {
      fetchMock.mockResolvedValue(xmlResponse(
        errorXml('500000', 'Internal Server Error', 'Unexpected failure.'),
        { status: 500 }
      ));
      const server = createServer({ retry: { maxRetries: 3, baseDelay: 0 } });

      const error = await server.datasources.delete('ds-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerResponseError);
      expect(error).toMatchObject({ status: 500, serverCode: '500000', summary: 'Internal Server Error' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('download', () => {
    const contents = 'datasource-bytes';

    function downloadResponse(disposition?: string): Response {
      const headers = new Headers({ 'Content-Type': 'application/octet-stream' });
      if (disposition) headers.set('Content-Disposition', disposition);
      return new Response(contents, { status: 200, headers });
    }

    it('should write into a directory under the server file name', async () => {
      fetchMock.mockResolvedValue(downloadResponse('name="tableau_datasource"; filename="Sample datasource.tds"'));
      const server = createServer();

      const written = await server.datasources.download('ds-1', tempDir);

      expect(requestAt(fetchMock, 0).url).toBe(`${DATASOURCES_URL}/ds-1/content`);
      expect(written).toBe(path.join(tempDir, 'Sample datasource.tds'));
      expect(await fs.readFile(written, 'utf8')).toBe(contents);
    });

    it('should write into the working directory when no path is given', async () => {
      fetchMock.mockResolvedValue(downloadResponse('attachment; filename="Sample.tdsx"'));
      const cwd = vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
      const server = createServer();

      try {
        const written = await server.datasources.download('ds-1');

        expect(written).toBe(path.join(tempDir, 'Sample.tdsx'));
        expect(await fs.readFile(written, 'utf8')).toBe(contents);
      } finally {
        cwd.mockRestore();
      }
    });

    it('should write to an explicit file path', async () => {
      fetchMock.mockResolvedValue(downloadResponse('attachment; filename="Sample.tdsx"'));
      const server = createServer();
      const target = path.join(tempDir, 'renamed.tdsx');

      const written = await server.datasources.download('ds-1', target);

      expect(written).toBe(target);
      expect(await fs.readFile(target, 'utf8')).toBe(contents);
    });

    it('should keep only the base name the server sends', async () => {
      fetchMock.mockResolvedValue(downloadResponse('attachment; filename="../../etc/Sample.tds"'));
      const server = createServer();

      const written = await server.datasources.download('ds-1', tempDir);

      expect(written).toBe(path.join(tempDir, 'Sample.tds'));
    });

    it('should fail when the response names no file', async () => {
      fetchMock.mockResolvedValue(downloadResponse());
      const server = createServer();

      await expect(server.datasources.download('ds-1', tempDir)).rejects.toBeInstanceOf(ResponseParseError);
    });

    it('should reject an empty id', async () => {
      const server = createServer();

      await expect(server.datasources.download('', tempDir)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('update', () => {
    it('should send the new values and return an updated copy', async () => {
      fetchMock.mockResolvedValue(xmlResponse(singleDatasourceXml('ds-1', 'Renamed', 'proj-9')));
      const server = createServer();
      const [fetched] = DatasourceItem.fromResponse(singleDatasourceXml('ds-1', 'Sales', 'proj-1'));
      fetched.name = 'Renamed';

      const updated = await server.datasources.update(fetched);

      const request = requestAt(fetchMock, 0);
      expect(request.method).toBe('PUT');
      expect(request.url).toBe(`${DATASOURCES_URL}/ds-1`);
      expect(request.headers.get('Content-Type')).toBe('text/xml');
      expect(parseXml(request.body)).toEqual({
        tsRequest: {
          datasource: [{
            '@_name': 'Renamed',
            project: { '@_id': 'proj-1' },
            owner: { '@_id': 'user-1' }
          }]
        }
      });

      expect(updated).not.toBe(fetched);
      expect(updated.projectId).toBe('proj-9');
      expect(fetched.projectId).toBe('proj-1');
    });

    it('should reject an item without an id', async () => {
      const server = createServer();

      await expect(server.datasources.update(new DatasourceItem('proj-1', 'Sales'))).rejects.toThrow(
        'Datasource item missing ID. Datasource must be retrieved from server first.'
      );
    });
  });

  describe('publish', () => {
    async function writeFile(name: string, contents: string): Promise<string> {
      const filePath = path.join(tempDir, name);
      await fs.writeFile(filePath, contents);
      return filePath;
    }

    it('should publish a small file in a single multipart request', async () => {
      fetchMock.mockResolvedValue(xmlResponse(singleDatasourceXml('ds-new', 'Sample')));
      const server = createServer();
      const filePath = await writeFile('Sample.tds', 'tds-contents');
      const item = new DatasourceItem('proj-1');

      const published = await server.datasources.publish(item, filePath, PublishMode.Overwrite);

      expect(item.name).toBe('Sample');
      expect(published.id).toBe('ds-new');

      const request = requestAt(fetchMock, 0);
      expect(request.method).toBe('POST');
      expect(request.url).toBe(`${DATASOURCES_URL}?datasourceType=tds&overwrite=true`);
      expect(request.headers.get('Content-Type')).toMatch(/^multipart\/mixed; boundary=[0-9a-f]{32}$/);
      expect(request.body).toContain('Content-Disposition: name="tableau_datasource"; filename="Sample.tds"');
      expect(request.body).toContain('<tsRequest><datasource name="Sample"><project id="proj-1"/></datasource></tsRequest>');
      expect(request.body).toContain('\r\n\r\ntds-contents\r\n');
    });

    it('should add append=true in Append mode and nothing in CreateNew mode', async () => {
      fetchMock.mockImplementation(async () => xmlResponse(singleDatasourceXml('ds-new', 'Sample')));
      const server = createServer();
      const filePath = await writeFile('Sample.tdsx', 'x');

      await server.datasources.publish(new DatasourceItem('proj-1', 'Sample'), filePath, PublishMode.Append);
      await server.datasources.publish(new DatasourceItem('proj-1', 'Sample'), filePath, PublishMode.CreateNew);

      expect(requestAt(fetchMock, 0).url).toBe(`${DATASOURCES_URL}?datasourceType=tdsx&append=true`);
      expect(requestAt(fetchMock, 1).url).toBe(`${DATASOURCES_URL}?datasourceType=tdsx`);
    });

    it('should upload a file at the size limit in chunks', async () => {
      fetchMock.mockImplementation(async (input, init) => {
        const url = String(input);
        if (url === `${SITE_URL}/fileUploads` && init?.method === 'POST') {
          return xmlResponse(fileUploadXml('upload-1'));
        }
        if (url === `${SITE_URL}/fileUploads/upload-1` && init?.method === 'PUT') {
          return xmlResponse(fileUploadXml('upload-1', 4));
        }
        return xmlResponse(singleDatasourceXml('ds-big', 'Big'));
      });
      const server = createServer({ upload: { filesizeLimit: 10, chunkSize: 4 } });
      const filePath = await writeFile('Big.tdsx', '0123456789');

      const published = await server.datasources.publish(new DatasourceItem('proj-1'), filePath, PublishMode.Append);

      expect(published.id).toBe('ds-big');
      expect(fetchMock).toHaveBeenCalledTimes(5);

      const chunks = [1, 2, 3].map(index => requestAt(fetchMock, index));
      expect(chunks.map(chunk => chunk.method)).toEqual(['PUT', 'PUT', 'PUT']);
      expect(chunks[0].body).toContain('\r\n\r\n0123\r\n');
      expect(chunks[1].body).toContain('\r\n\r\n4567\r\n');
      expect(chunks[2].body).toContain('\r\n\r\n89\r\n');

      const commit = requestAt(fetchMock, 4);
      expect(commit.url).toBe(`${DATASOURCES_URL}?datasourceType=tdsx&append=true&uploadSessionId=upload-1`);
      expect(commit.body).toContain('name="request_payload"');
      expect(commit.body).not.toContain('tableau_datasource');
    });

    it('should publish a file just below the size limit in one request', async () => {
      fetchMock.mockResolvedValue(xmlResponse(singleDatasourceXml('ds-new', 'Small')));
      const server = createServer({ upload: { filesizeLimit: 10, chunkSize: 4 } });
      const filePath = await writeFile('Small.tds', '012345678');

      await server.datasources.publish(new DatasourceItem('proj-1'), filePath, PublishMode.CreateNew);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(requestAt(fetchMock, 0).url).toBe(`${DATASOURCES_URL}?datasourceType=tds`);
    });

    it('should reject a path that is not a file', async () => {
      const server = createServer();

      await expect(
        server.datasources.publish(new DatasourceItem('proj-1'), path.join(tempDir, 'missing.tds'), PublishMode.CreateNew)
      ).rejects.toThrow(new FileNotFoundError('File path does not lead to an existing file.'));
      await expect(
        server.datasources.publish(new DatasourceItem('proj-1'), tempDir, PublishMode.CreateNew)
      ).rejects.toBeInstanceOf(FileNotFoundError);
    });

    it('should reject an unknown mode before sending anything', async () => {
      const server = createServer();
      const filePath = await writeFile('Sample.tds', 'x');
      const mode: string = 'Replace';

      await expect(
        server.datasources.publish(new DatasourceItem('proj-1'), filePath, mode as PublishMode)
      ).rejects.toThrow(new ValidationError('Invalid mode defined.'));
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should check the file before the mode and the mode before the extension', async () => {
      const server = createServer();
      const csvPath = await writeFile('data.csv', 'a,b');
      const mode: string = 'Replace';

      await expect(
        server.datasources.publish(new DatasourceItem('proj-1'), path.join(tempDir, 'missing.csv'), mode as PublishMode)
      ).rejects.toBeInstanceOf(FileNotFoundError);
      await expect(
        server.datasources.publish(new DatasourceItem('proj-1'), csvPath, mode as PublishMode)
      ).rejects.toThrow(new ValidationError('Invalid mode defined.'));
    });

    it('should reject other file types after naming the item', async () => {
      const server = createServer();
      const filePath = await writeFile('data.csv', 'a,b');
      const item = new DatasourceItem('proj-1');

      await expect(server.datasources.publish(item, filePath, PublishMode.CreateNew)).rejects.toThrow(
        new ValidationError('Only tds, tdsx, tde files can be published as datasources.')
      );
      expect(item.name).toBe('data');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
