/**
 * Query executor types
 */

import type { Document, FindOptions } from "mongodb";
import type { SampleDocument } from "../../types/data-model.js";

export type SortDirection = 1 | -1;

export interface SortSpec {
  field: string;
  direction: SortDirection;
}

export interface FindRequest {
  filter: unknown;
  projection?: Document;
  sort?: SortSpec[];
  limit?: number;
  skip?: number;
}

export interface FindResult {
  documents: SampleDocument[];
  count: number;
}

/**
 * The part of a driver collection the executor reads through
 */
export interface FindableCollection {
  readonly collectionName: string;
  find(
    filter: Document,
    options: FindOptions,
  ): { toArray(): Promise<SampleDocument[]> };
}
