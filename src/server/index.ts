export * from './Server';
export * from './Pager';
export * from './RequestFactory';
export { Endpoint, ServerResponse } from './endpoint/Endpoint';
export { DatasourcesEndpoint, ALLOWED_FILE_EXTENSIONS } from './endpoint/DatasourcesEndpoint';
export { FileuploadsEndpoint } from './endpoint/FileuploadsEndpoint';
