export interface LogMetadata {
  component?: string;
  url?: string;
  method?: string;
  status?: number;
  stack?: string;
  traceId?: string;
  spanId?: string;

  // Endpoint specific properties
  datasourceId?: string;
  uploadSessionId?: string;
  filePath?: string;
  fileSize?: number;
  [key: string]: unknown;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';
