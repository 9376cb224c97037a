import { parseTsResponse } from '../utils/xmlUtils';
import { ConnectionElement, connectionsResponse } from './schemas';

/**
 * A connection a published datasource uses to reach its underlying data
 */
export class ConnectionItem {
  id?: string;
  connectionType?: string;
  serverAddress?: string;
  serverPort?: string;
  username?: string;
  embedPassword?: boolean;
  datasourceId?: string;
  datasourceName?: string;

  static fromElement(element: ConnectionElement): ConnectionItem {
    const item = new ConnectionItem();
    item.id = element['@_id'];
    item.connectionType = element['@_type'];
    item.serverAddress = element['@_serverAddress'];
    item.serverPort = element['@_serverPort'];
    item.username = element['@_userName'];
    if (element['@_embedPassword'] !== undefined) {
      item.embedPassword = element['@_embedPassword'] === 'true';
    }

    const datasource = element.datasource?.[0];
    item.datasourceId = datasource?.['@_id'];
    item.datasourceName = datasource?.['@_name'];

    return item;
  }

  /**
   * Reads every `tsResponse/connections/connection` element
   */
  static fromResponse(body: string): ConnectionItem[] {
    const { connections } = parseTsResponse(body, connectionsResponse);
    return (connections?.connection ?? []).map(element => ConnectionItem.fromElement(element));
  }
}
