/**
 * Tests for the document assembler
 */

import { describe, it, expect } from 'vitest';
import {
  assembleDocument,
  checkIncludes,
  renderRequirement,
  renderTest,
  resolveIncludes,
  verifyIncludes,
  type NarrativeDocument,
} from './document-assembler.js';
import { synthesizeProfile } from './requirement-synthesizer.js';
import { createProfileConfig } from '../services/config-schema.js';
import { findPlaceholders } from '../catalog/template.js';
import { isProfileGenError } from '../../utils/errors.js';

const config = createProfileConfig({
  profileName: 'weather-stations',
  title: 'Weather Stations',
  author: 'Test Editor',
  organization: 'Test Org',
  collections: [
    { name: 'stations', queryTypes: ['items'], formats: ['GeoJSON'], properties: ['station_id', 'temperature'] },
  ],
});
const graph = synthesizeProfile(config);

function fileContent(document: NarrativeDocument, path: string): string {
  const file = document.files.find(f => f.path === path);
  if (!file) throw new Error(`no file ${path}`);
  return file.content;
}

describe('document-assembler', () => {
  describe('renderRequirement', () => {
    it('should render a requirement block', () => {
      expect(renderRequirement(graph.requirements[0])).toBe(
        [
          '[[req.weather-stations.openapi]]',
          '[requirement]',
          '====',
          '[%metadata]',
          'identifier:: /req/weather-stations/openapi',
          'statement:: OpenAPI specification',
          'part:: The service SHALL provide an OpenAPI 3.0 specification',
          'part:: The OpenAPI SHALL document all collection endpoints',
          'part:: The OpenAPI SHALL include GeoJSON schemas',
          '====',
          '',
        ].join('\n')
      );
    });
  });

  describe('renderTest', () => {
    it('should render an abstract test block with its target', () => {
      const lines = renderTest(graph.tests[1]).split('\n');

      expect(lines.slice(0, 8)).toEqual([
        '[[ats.weather-stations.collections.stations]]',
        '[abstract_test]',
        '====',
        '[%metadata]',
        'identifier:: /conf/weather-stations/collections/stations',
        'target:: /req/weather-stations/collections/stations',
        'test-purpose:: Validate that the stations collection metadata is published and complete.',
        'test-method::',
      ]);
      expect(lines[8]).toBe('step:: Send GET request to /collections/stations');
    });
  });

  describe('assembleDocument', () => {
    const document = assembleDocument(config, graph);

    it('should list the root, sections, classes and fragments in order', () => {
      expect(document.root).toBe('weather-stations_profile.adoc');
      expect(document.files.map(f => f.path)).toEqual([
        'weather-stations_profile.adoc',
        'sections/clause_0_front_material.adoc',
        'sections/clause_1_scope.adoc',
        'sections/clause_2_conformance.adoc',
        'sections/clause_3_references.adoc',
        'sections/clause_4_terms_and_definitions.adoc',
        'sections/clause_5_conventions.adoc',
        'sections/clause_6_context.adoc',
        'sections/clause_7_weather-stations.adoc',
        'sections/annex-a.adoc',
        'sections/annex-history.adoc',
        'sections/annex-bibliography.adoc',
        'requirements/requirements_class_core.adoc',
        'requirements/core/REQ_openapi.adoc',
        'requirements/core/REQ_collections.stations.adoc',
        'requirements/core/REQ_collections.stations.query.items.adoc',
        'requirements/core/REQ_collections.stations.format.geojson.adoc',
        'abstract_tests/ATS_class_core.adoc',
        'abstract_tests/core/ATS_openapi.adoc',
        'abstract_tests/core/ATS_collections.stations.adoc',
        'abstract_tests/core/ATS_collections.stations.query.items.adoc',
        'abstract_tests/core/ATS_collections.stations.format.geojson.adoc',
      ]);
    });

    it('should include requirements relative to the profile clause', () => {
      const includes = fileContent(document, 'sections/clause_7_weather-stations.adoc')
        .split('\n')
        .filter(line => line.startsWith('include::'));

      expect(includes).toEqual([
        'include::../requirements/requirements_class_core.adoc[]',
        'include::../requirements/core/REQ_openapi.adoc[]',
        'include::../requirements/core/REQ_collections.stations.adoc[]',
        'include::../requirements/core/REQ_collections.stations.query.items.adoc[]',
        'include::../requirements/core/REQ_collections.stations.format.geojson.adoc[]',
      ]);
    });

    it('should carry the editor in the header and submitters table', () => {
      const root = fileContent(document, 'weather-stations_profile.adoc');
      expect(root.split('\n')[0]).toBe('= OGC API-Environmental Data Retrieval - Part 3: Weather Stations');
      expect(root).toContain('\n:fullname: Test Editor (Test Org)\n');
      expect(fileContent(document, 'sections/clause_0_front_material.adoc')).toContain('|*Test Editor* |*Test Org*');
    });

    it('should list every requirement in the requirements class', () => {
      const lines = fileContent(document, 'requirements/requirements_class_core.adoc').split('\n');

      expect(lines.filter(l => l.startsWith('requirement:: '))).toEqual(
        graph.requirements.map(r => `requirement:: ${r.id}`)
      );
      expect(lines).toContain('target-type:: Weather Stations Profile Standard');
    });

    it('should leave no template markers', () => {
      for (const file of document.files) {
        expect(findPlaceholders(file.content)).toEqual([]);
      }
    });

    it('should produce a complete include graph', () => {
      expect(checkIncludes(document)).toEqual({ orphaned: [], missing: [] });
      expect(() => verifyIncludes(document)).not.toThrow();
    });
  });

  describe('resolveIncludes', () => {
    it('should resolve targets against the including file', () => {
      expect(
        resolveIncludes({
          path: 'sections/annex-a.adoc',
          content: 'include::../abstract_tests/ATS_class_core.adoc[]\ntext\ninclude::local.adoc[]\n',
        })
      ).toEqual(['abstract_tests/ATS_class_core.adoc', 'sections/local.adoc']);
    });
  });

  describe('verifyIncludes', () => {
    it('should report orphaned and missing files', () => {
      const document = assembleDocument(config, graph);
      const broken: NarrativeDocument = {
        root: document.root,
        files: [
          ...document.files.slice(0, -1),
          { path: 'sections/extra.adoc', content: '== Extra\n' },
        ],
      };

      expect(checkIncludes(broken)).toEqual({
        orphaned: ['sections/extra.adoc'],
        missing: ['abstract_tests/core/ATS_collections.stations.format.geojson.adoc'],
      });

      try {
        verifyIncludes(broken);
        expect.unreachable();
      } catch (error) {
        expect(isProfileGenError(error) && error.code).toBe('INCLUDE_MISMATCH');
        expect(error instanceof Error && error.message).toBe(
          'Document include list does not match generated files; ' +
            'orphaned (generated but never included): "sections/extra.adoc"; ' +
            'missing (included but not generated): "abstract_tests/core/ATS_collections.stations.format.geojson.adoc"'
        );
      }
    });
  });
});
