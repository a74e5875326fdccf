import { z } from "zod";
import { OFF_SEARCH_FIELDS } from "../config.js";
import { OffApiError, RateLimitError } from "../errors.js";

const numberOrString = z.union([z.number(), z.string()]);

// Only the fields this app reads; OFF returns far more
export const OffProductSchema = z.object({
  code: numberOrString.transform(String).optional(),
  product_name: z.string().nullish(),
  product_name_en: z.string().nullish(),
  brands: z.string().nullish(),
  nutriscore_grade: z.string().nullish(),
  nutrition_grades: z.string().nullish(),
  image_small_url: z.string().nullish(),
  image_url: z.string().nullish(),
  countries: z.string().nullish(),
  nutriments: z.record(z.unknown()).nullish(),
});

export type OffProductDto = z.infer<typeof OffProductSchema>;

const OffProductResponseSchema = z.object({
  code: numberOrString.transform(String).optional(),
  status: z.number().optional(),
  product: OffProductSchema.nullish(),
});

const OffSearchResponseSchema = z.object({
  count: z.number().optional(),
  products: z.array(z.unknown()).default([]),
});

export interface OffProductResult {
  product: OffProductDto | null;
  etag: string | null;
  notModified: boolean;
}

export interface OffApiOptions {
  baseUrl: string;
  userAgent: string;
  searchPageSize: number;
}

type FetchFn = typeof fetch;

/**
 * Open Food Facts HTTP client. No throttling here; see NetThrottle.
 */
export class OffApi {
  constructor(
    private readonly options: OffApiOptions,
    private readonly fetchImpl: FetchFn = (input, init) => fetch(input, init)
  ) {}

  /** Product by barcode with ETag revalidation; a 304 returns `notModified`. */
  async productByBarcode(barcode: string, etag?: string | null): Promise<OffProductResult> {
    const url = `${this.options.baseUrl}/api/v2/product/${encodeURIComponent(barcode)}.json`;
    const headers: Record<string, string> = {};
    if (etag) headers["If-None-Match"] = etag;

    const response = await this.get(url, headers);
    const responseEtag = response.headers.get("etag");

    if (response.status === 304) {
      return { product: null, etag: responseEtag ?? etag ?? null, notModified: true };
    }
    if (response.status === 404) {
      return { product: null, etag: null, notModified: false };
    }
    this.assertOk(response);

    const data = OffProductResponseSchema.parse(await response.json());
    if (data.status === 0 || !data.product) {
      return { product: null, etag: responseEtag, notModified: false };
    }

    return {
      product: { ...data.product, code: data.product.code ?? data.code ?? barcode },
      etag: responseEtag,
      notModified: false,
    };
  }

  async searchProducts(query: string, pageSize: number = this.options.searchPageSize, page = 1): Promise<OffProductDto[]> {
    const params = new URLSearchParams({
      json: "1",
      search_terms: query,
      search_simple: "1",
      page_size: String(pageSize),
      page: String(page),
      fields: OFF_SEARCH_FIELDS,
    });

    const response = await this.get(`${this.options.baseUrl}/cgi/search.pl?${params.toString()}`);
    this.assertOk(response);

    const data = OffSearchResponseSchema.parse(await response.json());
    const products: OffProductDto[] = [];
    for (const raw of data.products) {
      const parsed = OffProductSchema.safeParse(raw);
      if (parsed.success) products.push(parsed.data);
    }
    return products;
  }

  private get(url: string, extraHeaders: Record<string, string> = {}): Promise<Response> {
    return this.fetchImpl(url, {
      method: "GET",
      headers: {
        "User-Agent": this.options.userAgent,
        Accept: "application/json",
        ...extraHeaders,
      },
    });
  }

  private assertOk(response: Response): void {
    if (response.status === 429 || response.status === 503) {
      const retryAfter = Number.parseInt(response.headers.get("retry-after") ?? "", 10);
      throw new RateLimitError(
        `Open Food Facts rate limited (${response.status})`,
        Number.isFinite(retryAfter) ? retryAfter : null
      );
    }
    if (!response.ok) {
      throw new OffApiError(`Open Food Facts error: ${response.status} ${response.statusText}`, response.status);
    }
  }
}
