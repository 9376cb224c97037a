/**
 * How a publish treats an existing datasource of the same name
 */
export const PublishMode = {
  Append: 'Append',
  Overwrite: 'Overwrite',
  CreateNew: 'CreateNew'
} as const;

export type PublishMode = typeof PublishMode[keyof typeof PublishMode];

const PUBLISH_MODES: ReadonlySet<string> = new Set(Object.values(PublishMode));

export function isPublishMode(value: unknown): value is PublishMode {
  return typeof value === 'string' && PUBLISH_MODES.has(value);
}
