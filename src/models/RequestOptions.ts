import {
  RequestOptionsInput,
  filterSchema,
  requestOptionsSchema,
  sortSchema,
  validateInput
} from '../utils/validation';

export type { RequestOptionsInput };

export type SortDirection = 'asc' | 'desc';
export type FilterOperator = 'eq' | 'gt' | 'gte' | 'lt' | 'lte' | 'in' | 'has';
type FilterScalar = string | number | boolean;

export interface Sort {
  field: string;
  direction: SortDirection;
}

export interface Filter {
  field: string;
  operator: FilterOperator;
  value: FilterScalar | FilterScalar[];
}

/**
 * Paging, sorting and filtering for list requests.
 *
 * @example
 * const options = new RequestOptions({ pageSize: 50 })
 *   .addSort('name', 'asc')
 *   .addFilter('name', 'eq', 'Sales');
 */
export class RequestOptions {
  readonly pageNumber: number;
  readonly pageSize: number;
  private readonly _sort: Sort[];
  private readonly _filter: Filter[];

  /**
   * @throws ValidationError when an option is out of range
   */
  constructor(input: RequestOptionsInput = {}) {
    const options = validateInput(input, requestOptionsSchema);
    this.pageNumber = options.pageNumber;
    this.pageSize = options.pageSize;
    this._sort = options.sort;
    this._filter = options.filter;
  }

  get sort(): readonly Sort[] {
    return this._sort;
  }

  get filter(): readonly Filter[] {
    return this._filter;
  }

  /**
   * @throws ValidationError for an empty field or unknown direction
   */
  addSort(field: string, direction: SortDirection = 'asc'): this {
    this._sort.push(validateInput({ field, direction }, sortSchema));
    return this;
  }

  /**
   * @throws ValidationError for an empty field, unknown operator or unsupported value
   */
  addFilter(field: string, operator: FilterOperator, value: Filter['value']): this {
    this._filter.push(validateInput({ field, operator, value }, filterSchema));
    return this;
  }

  /**
   * Copy pointing at another page
   */
  withPage(pageNumber: number): RequestOptions {
    return new RequestOptions({
      pageNumber,
      pageSize: this.pageSize,
      sort: [...this.sort],
      filter: [...this.filter]
    });
  }

  /**
   * Writes the options onto a URL as `pageSize`, `pageNumber`, `sort` and
   * `filter` query parameters
   */
  applyQueryParams(url: URL): URL {
    url.searchParams.set('pageSize', String(this.pageSize));
    url.searchParams.set('pageNumber', String(this.pageNumber));

    if (this.sort.length > 0) {
      url.searchParams.set(
        'sort',
        this.sort.map(s => `${s.field}:${s.direction}`).join(',')
      );
    }

    if (this.filter.length > 0) {
      url.searchParams.set(
        'filter',
        this.filter.map(f => `${f.field}:${f.operator}:${formatFilterValue(f.value)}`).join(',')
      );
    }

    return url;
  }
}

function formatFilterValue(value: Filter['value']): string {
  return Array.isArray(value) ? `[${value.join(',')}]` : String(value);
}
