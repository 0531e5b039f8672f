import type { Bin, BinName, CapturedRequest } from '../models';

/** Storage operations the HTTP layer relies on. */
export interface BinStorageBackend {
  /** Persists a new, empty bin whose details expire `ttlSeconds` after creation. */
  createBin(isPrivate?: boolean, ttlSeconds?: number): Promise<Bin>;
  /**
   * Stores one captured payload under `bin` and appends it to the bin's index.
   * Throws `IdAllocationExhaustedError` when no free id is found.
   */
  createRequest(bin: Bin, payload: Buffer, ttlSeconds?: number): Promise<CapturedRequest>;
  /** Details only, `requests` left empty. Throws `NotFoundError` like `lookupBin`. */
  getBin(name: BinName): Promise<Bin>;
  /** Returns the bin with its requests newest first, or throws `NotFoundError`. */
  lookupBin(name: BinName): Promise<Bin>;
  countBins(): Promise<number>;
  countRequests(): Promise<number>;
  /** Average backend footprint per key, in kilobytes. */
  avgRequestSize(): Promise<number>;
  health(): Promise<{ ok: boolean; details?: string }>;
}
