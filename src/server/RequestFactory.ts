/**
 * Builds request bodies for the datasources and file upload resources
 */

import { DatasourceItem } from '../models/DatasourceItem';
import { buildXml } from '../utils/xmlUtils';
import { buildMultipartBody, RequestBody } from '../utils/httpUtils';

function idElement(id?: string): Record<string, string> | undefined {
  return id ? { '@_id': id } : undefined;
}

// Drops undefined members so the builder never sees them
function compact(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

function datasourcePayload(item: DatasourceItem): string {
  return buildXml({
    tsRequest: {
      datasource: compact({
        '@_name': item.name,
        project: idElement(item.projectId)
      })
    }
  });
}

export const RequestFactory = {
  datasource: {
    /**
     * `<tsRequest><datasource name><project id/><owner id/></datasource></tsRequest>`,
     * omitting whatever the item does not set
     */
    updateReq(item: DatasourceItem): string {
      return buildXml({
        tsRequest: {
          datasource: compact({
            '@_name': item.name,
            project: idElement(item.projectId),
            owner: idElement(item.ownerId)
          })
        }
      });
    },

    /**
     * Single-request publish: the XML payload followed by the file itself
     */
    publishReq(item: DatasourceItem, filename: string, fileContents: Buffer): RequestBody {
      return buildMultipartBody([
        { name: 'request_payload', contentType: 'text/xml', body: datasourcePayload(item) },
        {
          name: 'tableau_datasource',
          filename,
          contentType: 'application/octet-stream',
          body: fileContents
        }
      ]);
    },

    /**
     * Commit of a chunked publish: the file already sits in an upload session
     */
    publishReqChunked(item: DatasourceItem): RequestBody {
      return buildMultipartBody([
        { name: 'request_payload', contentType: 'text/xml', body: datasourcePayload(item) }
      ]);
    }
  },

  fileupload: {
    chunkReq(chunk: Buffer): RequestBody {
      return buildMultipartBody([
        { name: 'request_payload', contentType: 'text/xml', body: '' },
        { name: 'tableau_file', filename: 'file', contentType: 'application/octet-stream', body: chunk }
      ]);
    }
  }
};
