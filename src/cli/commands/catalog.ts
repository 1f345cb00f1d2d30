/**
 * edr-profile-gen catalog command
 *
 * Lists the query types and output formats a configuration may use.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { DEFAULT_CATALOGS, type Catalogs } from '../../core/catalog/index.js';

export interface CatalogListing {
  queryTypes: Array<{ id: string; statement: string; endpoints: string[] }>;
  formats: Array<{ id: string; label: string; mediaType: string }>;
}

export function listCatalogs(catalogs: Catalogs = DEFAULT_CATALOGS): CatalogListing {
  return {
    queryTypes: [...catalogs.queryTypes.values()].map(entry => ({
      id: entry.id,
      statement: entry.statement,
      endpoints: entry.endpoints.map(e => `/collections/{collection}/${e.suffix}`),
    })),
    formats: [...catalogs.formats.values()].map(entry => ({
      id: entry.id,
      label: entry.label,
      mediaType: entry.mediaType,
    })),
  };
}

export const catalogCommand = new Command('catalog')
  .description('List the supported query types and output formats')
  .option('--json', 'Print the catalog as JSON', false)
  .action((options: { json?: boolean }) => {
    const listing = listCatalogs();

    if (options.json) {
      console.log(JSON.stringify(listing, null, 2));
      return;
    }

    logger.section('Query types');
    for (const queryType of listing.queryTypes) {
      logger.listItem(queryType.id);
      for (const endpoint of queryType.endpoints) {
        logger.listItem(endpoint, 1);
      }
    }
    logger.blank();

    logger.section('Output formats');
    for (const format of listing.formats) {
      logger.listItem(`${format.id} (f=${format.label}, ${format.mediaType})`);
    }
  });
