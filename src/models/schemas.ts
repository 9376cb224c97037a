/**
 * Shapes of the response elements the client reads, in the parser's `@_`
 * attribute notation. Unknown attributes and elements are ignored.
 */
import { z } from 'zod';
import { element } from '../utils/xmlUtils';

export const tagElement = z.object({ '@_label': z.string() });

export const datasourceElement = z.object({
  '@_id': z.string(),
  '@_name': z.string().optional(),
  '@_contentUrl': z.string().optional(),
  '@_type': z.string().optional(),
  '@_createdAt': z.string().optional(),
  '@_updatedAt': z.string().optional(),
  project: element(z.object({
    '@_id': z.string().optional(),
    '@_name': z.string().optional()
  })).optional(),
  owner: element(z.object({ '@_id': z.string().optional() })).optional(),
  tags: element(z.object({ tag: z.array(tagElement).optional() })).optional()
});

export type DatasourceElement = z.infer<typeof datasourceElement>;

export const connectionElement = z.object({
  '@_id': z.string(),
  '@_type': z.string().optional(),
  '@_serverAddress': z.string().optional(),
  '@_serverPort': z.string().optional(),
  '@_userName': z.string().optional(),
  '@_embedPassword': z.string().optional(),
  datasource: z.array(z.object({
    '@_id': z.string().optional(),
    '@_name': z.string().optional()
  })).optional()
});

export type ConnectionElement = z.infer<typeof connectionElement>;

export const paginationElement = z.object({
  '@_pageNumber': z.string(),
  '@_pageSize': z.string(),
  '@_totalAvailable': z.string()
});

export const errorElement = z.object({
  '@_code': z.string().optional(),
  summary: z.string().optional(),
  detail: z.string().optional()
});

export const fileUploadElement = z.object({
  '@_uploadSessionId': z.string().min(1),
  '@_fileSize': z.string().optional()
});

export const datasourcesResponse = z.object({
  datasources: element(z.object({ datasource: z.array(datasourceElement).optional() })).optional(),
  datasource: z.array(datasourceElement).optional()
});

export const paginationResponse = z.object({
  pagination: paginationElement.optional()
});

export const connectionsResponse = z.object({
  connections: element(z.object({ connection: z.array(connectionElement).optional() })).optional()
});

export const errorResponse = z.object({
  error: errorElement
});

export const fileUploadResponse = z.object({
  fileUpload: fileUploadElement
});
