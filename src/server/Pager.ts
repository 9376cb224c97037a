import { PaginationItem } from '../models/PaginationItem';
import { RequestOptions } from '../models/RequestOptions';

export type PageFetcher<T> = (options: RequestOptions) => Promise<[T[], PaginationItem]>;

/**
 * Iterates every item of a paged list, fetching one page at a time.
 * Iteration stops once `totalAvailable` items were seen or a page comes back empty.
 *
 * @example
 * for await (const datasource of server.datasources.all({ pageSize: 50 })) {
 *   console.log(datasource.name);
 * }
 */
export class Pager<T> implements AsyncIterable<T> {
  constructor(
    private readonly fetchPage: PageFetcher<T>,
    private readonly options: RequestOptions = new RequestOptions()
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    let pageNumber = this.options.pageNumber;
    let seen = (pageNumber - 1) * this.options.pageSize;

    while (true) {
      const [items, pagination] = await this.fetchPage(this.options.withPage(pageNumber));
      for (const item of items) {
        yield item;
      }

      seen += items.length;
      if (items.length === 0 || seen >= pagination.totalAvailable) {
        return;
      }
      pageNumber++;
    }
  }

  /**
   * Collects every remaining item into an array
   */
  async toArray(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }
}
