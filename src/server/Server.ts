import { InvalidConfigError } from '../core/errors';
import { ServerConfig, ServerConfigInput, resolveConfig } from '../core/config';
import { logger } from '../core/logger';
import { PublishMode } from '../models/PublishMode';
import { sanitizeUrl } from '../utils/sanitize';
import { DatasourcesEndpoint } from './endpoint/DatasourcesEndpoint';
import { FileuploadsEndpoint } from './endpoint/FileuploadsEndpoint';

/**
 * Entry point to a server's REST API.
 *
 * Holds the connection settings and the session (site id and auth token)
 * that endpoints use to address and authorize their requests.
 *
 * @example
 * const server = new Server({ serverAddress: 'https://analytics.example.com' });
 * server.setSession('site-id', 'session-token');
 * const [datasources, pagination] = await server.datasources.get();
 */
export class Server {
  static readonly PublishMode = PublishMode;

  readonly config: ServerConfig;
  readonly datasources: DatasourcesEndpoint;
  readonly fileuploads: FileuploadsEndpoint;

  private _siteId?: string;
  private _authToken?: string;

  /**
   * @throws ValidationError when the configuration is invalid
   */
  constructor(config: ServerConfigInput | ServerConfig) {
    this.config = resolveConfig(config);

    const serverAddress = sanitizeUrl(this.config.serverAddress);
    if (!serverAddress) {
      throw new InvalidConfigError(
        'Server address must be an http(s) URL',
        'serverAddress',
        'url',
        this.config.serverAddress
      );
    }
    this.config = { ...this.config, serverAddress };

    this._siteId = this.config.siteId;
    this._authToken = this.config.authToken;

    this.datasources = new DatasourcesEndpoint(this);
    this.fileuploads = new FileuploadsEndpoint(this);
  }

  /** `{serverAddress}/api/{apiVersion}` */
  get baseurl(): string {
    return `${this.config.serverAddress}/api/${this.config.apiVersion}`;
  }

  get siteId(): string | undefined {
    return this._siteId;
  }

  get authToken(): string | undefined {
    return this._authToken;
  }

  /**
   * `{baseurl}/sites/{siteId}`
   *
   * @throws InvalidConfigError when no site id is set
   */
  get siteUrl(): string {
    if (!this._siteId) {
      throw new InvalidConfigError(
        'Site ID missing. Set a session before calling site endpoints.',
        'siteId',
        'string',
        this._siteId
      );
    }
    return `${this.baseurl}/sites/${encodeURIComponent(this._siteId)}`;
  }

  /**
   * Uses a session obtained from a sign-in for subsequent requests
   */
  setSession(siteId: string, authToken: string): void {
    this._siteId = siteId;
    this._authToken = authToken;
    logger.debug('Session set', { siteId });
  }

  clearSession(): void {
    this._siteId = undefined;
    this._authToken = undefined;
    logger.debug('Session cleared');
  }
}
