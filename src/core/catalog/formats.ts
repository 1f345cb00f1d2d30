/**
 * Format Catalog
 *
 * Requirement and test templates for each supported output format. Format
 * identifiers are matched case-insensitively and stored canonically.
 */

import { errors } from '../../utils/errors.js';
import { deepFreeze } from '../../utils/freeze.js';

export interface FormatEntry {
  /** Canonical identifier, e.g. GeoJSON */
  id: string;
  /** Value of the f= format label */
  label: string;
  mediaType: string;
  parts: readonly string[];
  steps: readonly string[];
}

export type FormatCatalog = ReadonlyMap<string, Readonly<FormatEntry>>;

export const BUILTIN_FORMATS = ['GeoJSON', 'CoverageJSON', 'CSV', 'NetCDF', 'GRIB', 'GRIB2', 'Zarr'] as const;

export type BuiltinFormat = (typeof BUILTIN_FORMATS)[number];

/** Catalog keys are lowercased identifiers */
export function formatKey(format: string): string {
  return format.toLowerCase();
}

export function defineFormatCatalog(entries: readonly FormatEntry[]): FormatCatalog {
  const map = new Map<string, Readonly<FormatEntry>>();
  for (const entry of entries) {
    const key = formatKey(entry.id);
    if (map.has(key)) {
      throw errors.duplicateIdentifier(entry.id, 'format');
    }
    map.set(key, deepFreeze({ ...entry }));
  }
  return map;
}

export function lookupFormat(
  catalog: FormatCatalog,
  format: string,
  collection?: string
): Readonly<FormatEntry> {
  const entry = catalog.get(formatKey(format));
  if (!entry) {
    throw errors.unknownFormat(
      format,
      [...catalog.values()].map(e => e.id),
      collection
    );
  }
  return entry;
}

const STANDARD_STEPS = [
  'Send GET request to /collections/{{collection}} and read the advertised output formats',
  'Verify {{format}} is listed with the label {{label}}',
  'Send a data query to /collections/{{collection}} with f={{label}}',
  'Verify the response Content-Type is {{mediaType}}',
];

const BUILTIN_ENTRIES: FormatEntry[] = [
  {
    id: 'GeoJSON',
    label: 'json',
    mediaType: 'application/geo+json',
    parts: [
      'A format with the label json SHALL provide GeoJSON output',
      'The GeoJSON output SHALL include standard GeoJSON properties: type, features, geometry, properties, and id',
      'The GeoJSON output SHALL include pagination metadata: numberMatched, numberReturned, and links array',
    ],
    steps: [...STANDARD_STEPS, 'Verify the response is a valid GeoJSON document with pagination metadata'],
  },
  {
    id: 'CoverageJSON',
    label: 'covjson',
    mediaType: 'application/prs.coverage+json',
    parts: [
      'A format with the label covjson SHALL provide CoverageJSON output conforming to the CoverageJSON specification',
    ],
    steps: [...STANDARD_STEPS, 'Verify the response validates against the CoverageJSON schema'],
  },
  {
    id: 'CSV',
    label: 'csv',
    mediaType: 'text/csv',
    parts: ['A format with the label csv SHALL provide CSV output with appropriate headers'],
    steps: [...STANDARD_STEPS, 'Verify the first row of the response is a header row'],
  },
  {
    id: 'NetCDF',
    label: 'netcdf',
    mediaType: 'application/x-netcdf',
    parts: ['A format with the label netcdf SHALL provide NetCDF output conforming to CF conventions'],
    steps: [...STANDARD_STEPS, 'Verify the response is a NetCDF file following CF conventions'],
  },
  {
    id: 'GRIB',
    label: 'grib',
    mediaType: 'application/x-grib',
    parts: ['A format with the label grib SHALL provide GRIB output conforming to WMO GRIB specification'],
    steps: [...STANDARD_STEPS, 'Verify the response decodes as a WMO GRIB message'],
  },
  {
    id: 'GRIB2',
    label: 'grib2',
    mediaType: 'application/x-grib2',
    parts: ['A format with the label grib2 SHALL provide GRIB2 output conforming to WMO GRIB2 specification'],
    steps: [...STANDARD_STEPS, 'Verify the response decodes as a WMO GRIB2 message'],
  },
  {
    id: 'Zarr',
    label: 'zarr',
    mediaType: 'application/vnd+zarr',
    parts: ['A format with the label zarr SHALL provide Zarr output conforming to Zarr specification'],
    steps: [...STANDARD_STEPS, 'Verify the response contains Zarr array metadata'],
  },
];

export const FORMAT_CATALOG: FormatCatalog = defineFormatCatalog(BUILTIN_ENTRIES);
