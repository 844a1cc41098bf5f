import type { ErpFilter, QueryParams, RawRow } from "@shared/schema";
import type { ErpFetcher } from "./erp-client";
import { logger as rootLogger, type StructuredLogger } from "./observability/logger";
import { incrementPagesFetched } from "./observability/metrics";

export const DEFAULT_PAGE_SIZE = 1000;

export interface ListingRequest {
  resource: string;
  fields: readonly string[];
  filters?: readonly ErpFilter[];
  orderBy?: string;
  pageSize?: number;
}

type PaginationOptions = {
  logger?: StructuredLogger;
};

/**
 * Query string for one listing page. Fields and filters travel JSON-encoded.
 */
export function buildListingParams(request: ListingRequest, offset: number): QueryParams {
  const params: QueryParams = {
    fields: JSON.stringify(Array.from(new Set(request.fields))),
    limit_page_length: request.pageSize ?? DEFAULT_PAGE_SIZE,
    limit_start: offset,
  };

  if (request.filters && request.filters.length > 0) {
    params.filters = JSON.stringify(request.filters);
  }
  if (request.orderBy) {
    params.order_by = request.orderBy;
  }

  return params;
}

/**
 * Reads every row a listing endpoint matches.
 *
 * The offset advances by the rows actually received, so a server that caps the
 * page below the requested size is still walked to the end. Paging stops on an
 * empty page or on a page shorter than the one before it.
 */
export async function fetchAllPages(
  fetcher: ErpFetcher,
  request: ListingRequest,
  options: PaginationOptions = {},
): Promise<RawRow[]> {
  const rows: RawRow[] = [];
  let previousPageLength: number | null = null;
  let pages = 0;

  for (;;) {
    const page = await fetcher.get(request.resource, buildListingParams(request, rows.length));
    pages += 1;
    incrementPagesFetched(request.resource);

    if (page.length === 0) {
      break;
    }

    for (const row of page) {
      rows.push(row);
    }

    if (previousPageLength !== null && page.length < previousPageLength) {
      break;
    }
    previousPageLength = page.length;
  }

  (options.logger ?? rootLogger).debug("ERP listing fetched", {
    event: "erp.listing",
    resource: request.resource,
    context: { pages, rows: rows.length },
  });

  return rows;
}
