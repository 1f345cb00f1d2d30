/**
 * Catalog module index
 */

import { QUERY_TYPE_CATALOG, type QueryTypeCatalog } from './query-types.js';
import { FORMAT_CATALOG, type FormatCatalog } from './formats.js';

export * from './query-types.js';
export * from './formats.js';
export * from './template.js';

export interface Catalogs {
  queryTypes: QueryTypeCatalog;
  formats: FormatCatalog;
}

export const DEFAULT_CATALOGS: Catalogs = Object.freeze({
  queryTypes: QUERY_TYPE_CATALOG,
  formats: FORMAT_CATALOG,
});
