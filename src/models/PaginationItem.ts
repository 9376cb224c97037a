import { parseTsResponse } from '../utils/xmlUtils';
import { paginationResponse } from './schemas';

/**
 * Paging state of a list response
 */
export class PaginationItem {
  constructor(
    readonly pageNumber: number,
    readonly pageSize: number,
    readonly totalAvailable: number
  ) {}

  /**
   * Reads `tsResponse/pagination`. A response without one is treated as an
   * empty first page.
   */
  static fromResponse(body: string): PaginationItem {
    const { pagination } = parseTsResponse(body, paginationResponse);
    if (!pagination) {
      return new PaginationItem(1, 0, 0);
    }

    return new PaginationItem(
      Number.parseInt(pagination['@_pageNumber'], 10),
      Number.parseInt(pagination['@_pageSize'], 10),
      Number.parseInt(pagination['@_totalAvailable'], 10)
    );
  }
}
