import { UnpopulatedPropertyError } from '../core/errors';
import { parseTsResponse } from '../utils/xmlUtils';
import { ConnectionItem } from './ConnectionItem';
import { DatasourceElement, datasourcesResponse } from './schemas';

/**
 * A published datasource as the server describes it.
 *
 * Items built locally (for publishing) only carry a project and a name; the
 * remaining fields are filled from server responses.
 */
export class DatasourceItem {
  id?: string;
  name?: string;
  projectId?: string;
  projectName?: string;
  ownerId?: string;
  contentUrl?: string;
  datasourceType?: string;
  createdAt?: Date;
  updatedAt?: Date;
  tags: Set<string> = new Set();

  private _connections?: ConnectionItem[];

  constructor(projectId?: string, name?: string) {
    this.projectId = projectId;
    this.name = name;
  }

  /**
   * Connections of the datasource, available after
   * `DatasourcesEndpoint.populateConnections`
   *
   * @throws UnpopulatedPropertyError before connections are populated
   */
  get connections(): ConnectionItem[] {
    if (this._connections === undefined) {
      throw new UnpopulatedPropertyError(
        'Datasource item must be populated with connections first.',
        'connections'
      );
    }
    return this._connections;
  }

  /** @internal Used by the endpoint once connections are fetched */
  setConnections(connections: ConnectionItem[]): void {
    this._connections = connections;
  }

  /**
   * Shallow copy; tags are copied into a new set
   */
  clone(): DatasourceItem {
    const copy = new DatasourceItem(this.projectId, this.name);
    copy.id = this.id;
    copy.projectName = this.projectName;
    copy.ownerId = this.ownerId;
    copy.contentUrl = this.contentUrl;
    copy.datasourceType = this.datasourceType;
    copy.createdAt = this.createdAt;
    copy.updatedAt = this.updatedAt;
    copy.tags = new Set(this.tags);
    copy._connections = this._connections;
    return copy;
  }

  /**
   * Returns a copy of this item updated from the first `<datasource>` in a
   * response body. The receiver is left untouched.
   */
  parseCommonTags(body: string): DatasourceItem {
    const [element] = DatasourceItem.elementsFromResponse(body);
    const updated = this.clone();
    if (element) {
      updated.applyElement(element);
    }
    return updated;
  }

  /**
   * Reads every `<datasource>` element of a response, in document order
   */
  static fromResponse(body: string): DatasourceItem[] {
    return DatasourceItem.elementsFromResponse(body).map(element => {
      const item = new DatasourceItem();
      item.id = element['@_id'];
      item.applyElement(element);
      return item;
    });
  }

  private static elementsFromResponse(body: string): DatasourceElement[] {
    const parsed = parseTsResponse(body, datasourcesResponse);
    return parsed.datasources?.datasource ?? parsed.datasource ?? [];
  }

  private applyElement(element: DatasourceElement): void {
    this.name = element['@_name'] ?? this.name;
    this.contentUrl = element['@_contentUrl'] ?? this.contentUrl;
    this.datasourceType = element['@_type'] ?? this.datasourceType;
    this.createdAt = parseDate(element['@_createdAt']) ?? this.createdAt;
    this.updatedAt = parseDate(element['@_updatedAt']) ?? this.updatedAt;
    this.projectId = element.project?.['@_id'] ?? this.projectId;
    this.projectName = element.project?.['@_name'] ?? this.projectName;
    this.ownerId = element.owner?.['@_id'] ?? this.ownerId;

    if (element.tags) {
      this.tags = new Set((element.tags.tag ?? []).map(tag => tag['@_label']));
    }
  }
}

function parseDate(value?: string): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
