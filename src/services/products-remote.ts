import type { OffApi, OffProductDto, OffProductResult } from "./off-api.js";
import type { NetThrottle } from "./net-throttle.js";

/** Online product source as seen by the catalogue. */
export interface RemoteProductSource {
  getByBarcode(barcode: string, etag?: string | null): Promise<OffProductResult>;
  search(query: string, limit: number): Promise<OffProductDto[]>;
}

/** OFF client behind the per-channel throttle. */
export class ThrottledOffSource implements RemoteProductSource {
  constructor(
    private readonly api: OffApi,
    private readonly throttle: NetThrottle
  ) {}

  getByBarcode(barcode: string, etag?: string | null): Promise<OffProductResult> {
    return this.throttle.runProduct(() => this.api.productByBarcode(barcode, etag));
  }

  search(query: string, limit: number): Promise<OffProductDto[]> {
    return this.throttle.runSearch(() => this.api.searchProducts(query, limit));
  }
}
