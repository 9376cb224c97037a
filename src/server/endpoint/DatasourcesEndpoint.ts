import fs from 'fs/promises';
import path from 'path';
import type { Server } from '../Server';
import { Endpoint } from './Endpoint';
import { RequestFactory } from '../RequestFactory';
import { Pager } from '../Pager';
import {
  FileNotFoundError,
  MissingRequiredFieldError,
  ResponseParseError,
  ValidationError
} from '../../core/errors';
import { ConnectionItem } from '../../models/ConnectionItem';
import { DatasourceItem } from '../../models/DatasourceItem';
import { PaginationItem } from '../../models/PaginationItem';
import { PublishMode, isPublishMode } from '../../models/PublishMode';
import { RequestOptions, RequestOptionsInput } from '../../models/RequestOptions';
import { filenameFromContentDisposition, formatBytes } from '../../utils/httpUtils';
import { withSpan, SpanKind } from '../../utils/telemetry';

export const ALLOWED_FILE_EXTENSIONS = ['tds', 'tdsx', 'tde'] as const;

const MISSING_ID = 'Datasource ID undefined.';
const MISSING_ITEM_ID = 'Datasource item missing ID. Datasource must be retrieved from server first.';

function requireId(datasourceId: string | undefined): string {
  if (!datasourceId) {
    throw new ValidationError(MISSING_ID, 'datasourceId', 'string', datasourceId);
  }
  return datasourceId;
}

function requireItemId(item: DatasourceItem): string {
  if (!item.id) {
    throw new MissingRequiredFieldError(MISSING_ITEM_ID, 'id');
  }
  return item.id;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function fileSize(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : undefined;
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return undefined;
    }
    throw error;
  }
}

/**
 * The `datasources` resource of a site
 */
export class DatasourcesEndpoint extends Endpoint {
  constructor(parentSrv: Server) {
    super(parentSrv, 'endpoint.datasources');
  }

  private get baseurl(): string {
    return `${this.parentSrv.siteUrl}/datasources`;
  }

  private itemUrl(datasourceId: string, suffix: string = ''): string {
    return `${this.baseurl}/${encodeURIComponent(datasourceId)}${suffix}`;
  }

  /**
   * Lists one page of datasources on the site
   */
  async get(reqOptions?: RequestOptions | RequestOptionsInput): Promise<[DatasourceItem[], PaginationItem]> {
    return withSpan('Datasources get', async () => {
      const options = reqOptions instanceof RequestOptions || reqOptions === undefined
        ? reqOptions
        : new RequestOptions(reqOptions);

      this.log.info('Querying all datasources on site');
      const response = await this.getRequest(this.baseurl, options);

      const paginationItem = PaginationItem.fromResponse(response.text);
      const datasourceItems = DatasourceItem.fromResponse(response.text);
      return [datasourceItems, paginationItem];
    }, { kind: SpanKind.CLIENT });
  }

  /**
   * Iterates every datasource on the site, fetching pages as needed
   */
  all(reqOptions?: RequestOptions | RequestOptionsInput): Pager<DatasourceItem> {
    const options = reqOptions instanceof RequestOptions
      ? reqOptions
      : new RequestOptions(reqOptions);
    return new Pager(pageOptions => this.get(pageOptions), options);
  }

  /**
   * Fetches a single datasource
   *
   * @throws ValidationError when the id is empty
   */
  async getById(datasourceId: string): Promise<DatasourceItem> {
    const id = requireId(datasourceId);

    return withSpan('Datasources getById', async (span) => {
      span.setAttribute('datasources.id', id);
      this.log.info(`Querying single datasource (ID: ${id})`, { datasourceId: id });

      const response = await this.getRequest(this.itemUrl(id));
      const [item] = DatasourceItem.fromResponse(response.text);
      if (!item) {
        throw new ResponseParseError('Response did not contain a datasource', { datasourceId: id });
      }
      return item;
    }, { kind: SpanKind.CLIENT });
  }

  /**
   * Fetches the connections of a datasource and stores them on the item
   *
   * @throws MissingRequiredFieldError when the item has no id
   */
  async populateConnections(item: DatasourceItem): Promise<void> {
    const id = requireItemId(item);

    await withSpan('Datasources populateConnections', async (span) => {
      span.setAttribute('datasources.id', id);

      const response = await this.getRequest(this.itemUrl(id, '/connections'));
      item.setConnections(ConnectionItem.fromResponse(response.text));
      this.log.info(`Populated connections for datasource (ID: ${id})`, { datasourceId: id });
    }, { kind: SpanKind.CLIENT });
  }

  /**
   * Deletes a datasource
   *
   * @throws ValidationError when the id is empty
   */
  async delete(datasourceId: string): Promise<void> {
    const id = requireId(datasourceId);

    await withSpan('Datasources delete', async (span) => {
      span.setAttribute('datasources.id', id);

      await this.deleteRequest(this.itemUrl(id));
      this.log.info(`Deleted single datasource (ID: ${id})`, { datasourceId: id });
    }, { kind: SpanKind.CLIENT });
  }

  /**
   * Downloads a datasource file.
   *
   * With no `filepath` the file lands in the working directory under the
   * name the server sends; with a directory it lands inside it under that
   * name; any other path is written as given.
   *
   * @returns The absolute path written
   * @throws ValidationError when the id is empty
   */
  async download(datasourceId: string, filepath?: string): Promise<string> {
    const id = requireId(datasourceId);

    return withSpan('Datasources download', async (span) => {
      span.setAttribute('datasources.id', id);

      const response = await this.getRequest(this.itemUrl(id, '/content'));
      const filename = filenameFromContentDisposition(response.headers.get('Content-Disposition'));
      if (!filename) {
        throw new ResponseParseError(
          'Download response did not name a file in Content-Disposition',
          { datasourceId: id }
        );
      }

      let target: string;
      if (filepath === undefined) {
        target = filename;
      } else if (await isDirectory(filepath)) {
        target = path.join(filepath, filename);
      } else {
        target = filepath;
      }
      const absolute = path.resolve(target);

      await fs.writeFile(absolute, response.content);

      this.log.info(`Downloaded datasource to ${absolute} (ID: ${id})`, {
        datasourceId: id,
        filePath: absolute,
        fileSize: response.content.length
      });
      return absolute;
    }, { kind: SpanKind.CLIENT });
  }

  /**
   * Sends the item's name, project and owner to the server
   *
   * @returns A copy of the item refreshed from the response; the argument is unchanged
   * @throws MissingRequiredFieldError when the item has no id
   */
  async update(item: DatasourceItem): Promise<DatasourceItem> {
    const id = requireItemId(item);

    return withSpan('Datasources update', async (span) => {
      span.setAttribute('datasources.id', id);

      const response = await this.putRequest(this.itemUrl(id), RequestFactory.datasource.updateReq(item));
      this.log.info(`Updated datasource item (ID: ${id})`, { datasourceId: id });

      return item.parseCommonTags(response.text);
    }, { kind: SpanKind.CLIENT });
  }

  /**
   * Publishes a `.tds`, `.tdsx` or `.tde` file as a datasource.
   *
   * Files at or above the configured size limit go through an upload session
   * first. An item without a name takes the file's base name.
   *
   * @throws FileNotFoundError when `filePath` is not an existing file
   * @throws ValidationError for an unknown mode or a disallowed extension
   */
  async publish(item: DatasourceItem, filePath: string, mode: PublishMode): Promise<DatasourceItem> {
    const size = await fileSize(filePath);
    if (size === undefined) {
      throw new FileNotFoundError('File path does not lead to an existing file.', filePath);
    }
    if (!isPublishMode(mode)) {
      throw new ValidationError('Invalid mode defined.', 'mode', 'PublishMode', mode);
    }

    const filename = path.basename(filePath);
    const extension = path.extname(filename);
    const fileExtension = extension.slice(1);

    if (!item.name) {
      item.name = path.basename(filename, extension);
    }
    if (!ALLOWED_FILE_EXTENSIONS.some(allowed => allowed === fileExtension)) {
      throw new ValidationError(
        `Only ${ALLOWED_FILE_EXTENSIONS.join(', ')} files can be published as datasources.`,
        'filePath',
        'file extension',
        fileExtension
      );
    }

    return withSpan('Datasources publish', async (span) => {
      span.setAttribute('datasources.publish.mode', mode);
      span.setAttribute('datasources.publish.size', size);

      let url = `${this.baseurl}?datasourceType=${fileExtension}`;
      if (mode === PublishMode.Overwrite || mode === PublishMode.Append) {
        url += `&${mode.toLowerCase()}=true`;
      }

      let body: Buffer;
      let contentType: string;
      if (size >= this.parentSrv.config.upload.filesizeLimit) {
        this.log.info(`Publishing ${filename} to server with chunking method (datasource of ${formatBytes(size)})`, {
          filePath,
          fileSize: size
        });
        const uploadSessionId = await this.parentSrv.fileuploads.uploadChunks(filePath);
        url += `&uploadSessionId=${encodeURIComponent(uploadSessionId)}`;
        [body, contentType] = RequestFactory.datasource.publishReqChunked(item);
      } else {
        this.log.info(`Publishing ${filename} to server`, { filePath, fileSize: size });
        const fileContents = await fs.readFile(filePath);
        [body, contentType] = RequestFactory.datasource.publishReq(item, filename, fileContents);
      }

      const response = await this.postRequest(url, body, contentType);
      const [published] = DatasourceItem.fromResponse(response.text);
      if (!published) {
        throw new ResponseParseError('Publish response did not contain a datasource', { filePath });
      }

      this.log.info(`Published ${filename} (ID: ${published.id})`, { datasourceId: published.id });
      return published;
    }, { kind: SpanKind.CLIENT });
  }
}
