import fs from 'fs';
import type { Server } from '../Server';
import { Endpoint } from './Endpoint';
import { RequestFactory } from '../RequestFactory';
import { fileUploadResponse } from '../../models/schemas';
import { parseTsResponse } from '../../utils/xmlUtils';
import { withSpan, SpanKind } from '../../utils/telemetry';
import { formatBytes } from '../../utils/httpUtils';

/**
 * Upload sessions for files too large to publish in one request
 */
export class FileuploadsEndpoint extends Endpoint {
  constructor(parentSrv: Server) {
    super(parentSrv, 'endpoint.fileuploads');
  }

  private get baseurl(): string {
    return `${this.parentSrv.siteUrl}/fileUploads`;
  }

  /**
   * Opens an upload session and returns its id
   */
  async initiate(): Promise<string> {
    const response = await this.postRequest(this.baseurl, '');
    const { fileUpload } = parseTsResponse(response.text, fileUploadResponse);
    const uploadId = fileUpload['@_uploadSessionId'];

    this.log.info(`Initiated file upload session (ID: ${uploadId})`, { uploadSessionId: uploadId });
    return uploadId;
  }

  /**
   * Appends one chunk to an open session
   */
  async append(uploadId: string, chunk: Buffer): Promise<void> {
    const url = `${this.baseurl}/${encodeURIComponent(uploadId)}`;
    const [body, contentType] = RequestFactory.fileupload.chunkReq(chunk);

    await this.putRequest(url, body, contentType);
    this.log.debug(`Uploading a chunk to session (ID: ${uploadId})`, {
      uploadSessionId: uploadId,
      fileSize: chunk.length
    });
  }

  /**
   * Streams a file into a new upload session, one chunk at a time and in order
   *
   * @returns The id of the session holding the file
   */
  async uploadChunks(filePath: string): Promise<string> {
    return withSpan('Fileuploads uploadChunks', async (span) => {
      const { chunkSize } = this.parentSrv.config.upload;
      span.setAttribute('fileuploads.chunk_size', chunkSize);

      const uploadId = await this.initiate();
      const stream = fs.createReadStream(filePath, { highWaterMark: chunkSize });

      let chunkIndex = 0;
      let total = 0;
      for await (const chunk of stream) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        await this.append(uploadId, buffer);
        chunkIndex++;
        total += buffer.length;
      }

      span.setAttribute('fileuploads.chunks', chunkIndex);
      this.log.info(`Completed file upload of ${formatBytes(total)} in ${chunkIndex} chunks (ID: ${uploadId})`, {
        uploadSessionId: uploadId,
        filePath,
        fileSize: total
      });
      return uploadId;
    }, { kind: SpanKind.CLIENT });
  }
}
