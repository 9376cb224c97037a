export * from './DatasourceItem';
export * from './ConnectionItem';
export * from './PaginationItem';
export * from './RequestOptions';
export * from './PublishMode';
