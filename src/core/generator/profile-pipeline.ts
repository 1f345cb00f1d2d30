/**
 * Profile Generation Pipeline
 *
 * Runs every stage in memory and returns the complete artifact set. All
 * cross-file checks (traceability, include completeness, channel links)
 * happen here, so a failing configuration never produces a partial profile
 * on disk.
 */

import YAML from 'yaml';
import logger from '../../utils/logger.js';
import { DEFAULT_CATALOGS, type Catalogs } from '../catalog/index.js';
import { synthesizeProfile } from './requirement-synthesizer.js';
import { assembleDocument, verifyIncludes, type NarrativeDocument } from './document-assembler.js';
import { ASYNCAPI_FILE, generateOpenApi, type OpenApiDocument } from './openapi-generator.js';
import { generateAsyncApi, verifyChannelLinks, type AsyncApiDocument } from './asyncapi-generator.js';
import { renderMakefile, renderMetanormaConfig, renderReadme } from './narrative-templates.js';
import { CONFIG_FILE_NAME, serializeConfig } from '../services/config-manager.js';
import type { Artifact, ArtifactSet, ProfileConfig, ProfileGraph } from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface PipelineOptions {
  catalogs?: Catalogs;
}

/**
 * Intermediate results, exposed for validation reports
 */
export interface ProfileBuild {
  graph: ProfileGraph;
  document: NarrativeDocument;
  openapi: OpenApiDocument;
  asyncapi?: AsyncApiDocument;
}

export const OPENAPI_FILE = 'openapi.yaml';

// ============================================================================
// PIPELINE
// ============================================================================

export function toYaml(value: unknown): string {
  return YAML.stringify(value, { lineWidth: 0, aliasDuplicateObjects: false });
}

/**
 * Synthesize, assemble and cross-check a profile without rendering files
 */
export function buildProfile(config: ProfileConfig, options: PipelineOptions = {}): ProfileBuild {
  const catalogs = options.catalogs ?? DEFAULT_CATALOGS;

  logger.debug(`Synthesizing requirements for ${config.profileName}`);
  const graph = synthesizeProfile(config, catalogs);

  logger.debug(`Assembling narrative (${graph.requirements.length} requirements, ${graph.tests.length} tests)`);
  const document = assembleDocument(config, graph);
  verifyIncludes(document);

  logger.debug('Generating API descriptions');
  const openapi = generateOpenApi(config, catalogs);
  const asyncapi = config.includeMessaging ? generateAsyncApi(config) : undefined;
  verifyChannelLinks(openapi, asyncapi);

  return asyncapi ? { graph, document, openapi, asyncapi } : { graph, document, openapi };
}

/**
 * Produce every artifact of a profile, in emission order
 *
 * Throws before returning anything if any invariant fails.
 */
export function generateProfile(config: ProfileConfig, options: PipelineOptions = {}): ArtifactSet {
  const { graph, document, openapi, asyncapi } = buildProfile(config, options);

  const artifacts: Artifact[] = document.files.map(file => ({
    path: file.path,
    content: file.content,
    kind: 'narrative',
  }));

  artifacts.push({ path: OPENAPI_FILE, content: toYaml(openapi), kind: 'openapi' });
  if (asyncapi) {
    artifacts.push({ path: ASYNCAPI_FILE, content: toYaml(asyncapi), kind: 'asyncapi' });
  }
  artifacts.push({ path: CONFIG_FILE_NAME, content: serializeConfig(config), kind: 'config' });
  artifacts.push(
    { path: 'README.md', content: renderReadme(config), kind: 'support' },
    { path: 'Makefile', content: renderMakefile(config.profileName), kind: 'support' },
    { path: 'metanorma.yml', content: renderMetanormaConfig(config.email), kind: 'support' }
  );

  return {
    profileName: config.profileName,
    artifacts,
    summary: {
      requirements: graph.requirements.length,
      tests: graph.tests.length,
      narrativeFiles: document.files.length,
      asyncapi: asyncapi !== undefined,
    },
  };
}
