/**
 * Document Assembler
 *
 * Renders the profile graph as Metanorma/AsciiDoc: one fragment per
 * requirement and abstract test, the two class blocks, the narrative
 * sections and the root document that includes them. Every generated file
 * must be reachable from the root through include:: directives, and every
 * include must name a generated file.
 */

import { posix } from 'node:path';
import { errors } from '../../utils/errors.js';
import {
  mainDocumentName,
  narrativeContext,
  profileClauseFile,
  renderAnnexA,
  renderBibliography,
  renderCollectionsSummary,
  renderConformance,
  renderContext,
  renderConventions,
  renderFrontMaterial,
  renderHistory,
  renderMainDocument,
  renderProfileClause,
  renderReferences,
  renderScope,
  renderTerms,
} from './narrative-templates.js';
import type {
  ConformanceClass,
  ProfileConfig,
  ProfileGraph,
  RequirementNode,
  RequirementsClass,
  TestNode,
} from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface NarrativeFile {
  /** Path relative to the profile output directory, "/" separated */
  path: string;
  content: string;
}

export interface NarrativeDocument {
  /** Path of the root document */
  root: string;
  /** Root first, then sections, then fragments in canonical order */
  files: NarrativeFile[];
}

export const REQUIREMENTS_DIR = 'requirements';
export const TESTS_DIR = 'abstract_tests';
export const SECTIONS_DIR = 'sections';

const REQUIREMENTS_CLASS_FILE = `${REQUIREMENTS_DIR}/requirements_class_core.adoc`;
const CONFORMANCE_CLASS_FILE = `${TESTS_DIR}/ATS_class_core.adoc`;

const INCLUDE_PATTERN = /^include::(.+?)\[\]\s*$/gm;

// ============================================================================
// FRAGMENTS
// ============================================================================

export function requirementPath(node: Pick<RequirementNode, 'fileName'>): string {
  return `${REQUIREMENTS_DIR}/core/${node.fileName}`;
}

export function testPath(node: Pick<TestNode, 'fileName'>): string {
  return `${TESTS_DIR}/core/${node.fileName}`;
}

export function renderRequirement(node: RequirementNode): string {
  return [
    `[[${node.anchor}]]`,
    '[requirement]',
    '====',
    '[%metadata]',
    `identifier:: ${node.id}`,
    `statement:: ${node.statement}`,
    ...node.parts.map(part => `part:: ${part}`),
    '====',
    '',
  ].join('\n');
}

export function renderTest(node: TestNode): string {
  return [
    `[[${node.anchor}]]`,
    '[abstract_test]',
    '====',
    '[%metadata]',
    `identifier:: ${node.id}`,
    `target:: ${node.target}`,
    `test-purpose:: ${node.purpose}`,
    'test-method::',
    ...node.steps.map(step => `step:: ${step}`),
    '====',
    '',
  ].join('\n');
}

export function renderRequirementsClass(cls: RequirementsClass): string {
  return [
    `[[${cls.anchor}]]`,
    '[requirements_class]',
    '====',
    '[%metadata]',
    `identifier:: ${cls.id}`,
    `target-type:: ${cls.targetType}`,
    ...cls.requirements.map(id => `requirement:: ${id}`),
    '====',
    '',
  ].join('\n');
}

export function renderConformanceClass(cls: ConformanceClass): string {
  return [
    `[[${cls.anchor}]]`,
    '[conformance_class]',
    '====',
    '[%metadata]',
    `identifier:: ${cls.id}`,
    `target:: ${cls.target}`,
    ...cls.tests.map(id => `abstract-test:: ${id}`),
    '====',
    '',
  ].join('\n');
}

/**
 * include:: directive for `target` as written inside the file at `from`
 */
function includeFrom(from: string, target: string): string {
  return `include::${posix.relative(posix.dirname(from), target)}[]`;
}

// ============================================================================
// ASSEMBLY
// ============================================================================

/**
 * Render every narrative file for a synthesized profile
 */
export function assembleDocument(config: ProfileConfig, graph: ProfileGraph): NarrativeDocument {
  const ctx = narrativeContext(config);
  const clause7 = profileClauseFile(config.profileName);
  const clause7Path = `${SECTIONS_DIR}/${clause7}`;
  const annexAPath = `${SECTIONS_DIR}/annex-a.adoc`;

  const sections: NarrativeFile[] = [
    { path: `${SECTIONS_DIR}/clause_0_front_material.adoc`, content: renderFrontMaterial(ctx) },
    { path: `${SECTIONS_DIR}/clause_1_scope.adoc`, content: renderScope(ctx) },
    { path: `${SECTIONS_DIR}/clause_2_conformance.adoc`, content: renderConformance(ctx) },
    { path: `${SECTIONS_DIR}/clause_3_references.adoc`, content: renderReferences(config.includeMessaging) },
    { path: `${SECTIONS_DIR}/clause_4_terms_and_definitions.adoc`, content: renderTerms() },
    { path: `${SECTIONS_DIR}/clause_5_conventions.adoc`, content: renderConventions(ctx) },
    { path: `${SECTIONS_DIR}/clause_6_context.adoc`, content: renderContext(ctx) },
    {
      path: clause7Path,
      content: renderProfileClause(
        ctx,
        renderCollectionsSummary(config.collections),
        includeFrom(clause7Path, REQUIREMENTS_CLASS_FILE),
        graph.requirements.map(r => includeFrom(clause7Path, requirementPath(r)))
      ),
    },
    {
      path: annexAPath,
      content: renderAnnexA(
        includeFrom(annexAPath, CONFORMANCE_CLASS_FILE),
        graph.tests.map(t => includeFrom(annexAPath, testPath(t)))
      ),
    },
    { path: `${SECTIONS_DIR}/annex-history.adoc`, content: renderHistory(ctx) },
    { path: `${SECTIONS_DIR}/annex-bibliography.adoc`, content: renderBibliography(config.includeMessaging) },
  ];

  const root = `${mainDocumentName(config.profileName)}.adoc`;
  const rootFile: NarrativeFile = {
    path: root,
    content: renderMainDocument(
      ctx,
      sections.map(s => posix.basename(s.path))
    ),
  };

  return {
    root,
    files: [
      rootFile,
      ...sections,
      { path: REQUIREMENTS_CLASS_FILE, content: renderRequirementsClass(graph.requirementsClass) },
      ...graph.requirements.map(r => ({ path: requirementPath(r), content: renderRequirement(r) })),
      { path: CONFORMANCE_CLASS_FILE, content: renderConformanceClass(graph.conformanceClass) },
      ...graph.tests.map(t => ({ path: testPath(t), content: renderTest(t) })),
    ],
  };
}

// ============================================================================
// INCLUDE VERIFICATION
// ============================================================================

/**
 * Targets of the include:: directives in a file, resolved against its directory
 */
export function resolveIncludes(file: NarrativeFile): string[] {
  const dir = posix.dirname(file.path);
  return [...file.content.matchAll(INCLUDE_PATTERN)].map(match =>
    posix.normalize(posix.join(dir, match[1]))
  );
}

export interface IncludeReport {
  /** Generated files no include reaches */
  orphaned: string[];
  /** Included files that were not generated */
  missing: string[];
}

/**
 * Walk the include graph from the root and compare it with the generated files
 */
export function checkIncludes(document: NarrativeDocument): IncludeReport {
  const byPath = new Map(document.files.map(f => [f.path, f]));
  const reached = new Set<string>([document.root]);
  const missing: string[] = [];
  const queue = [document.root];

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    const file = byPath.get(next);
    if (!file) continue;

    for (const target of resolveIncludes(file)) {
      if (!byPath.has(target)) {
        if (!missing.includes(target)) missing.push(target);
        continue;
      }
      if (!reached.has(target)) {
        reached.add(target);
        queue.push(target);
      }
    }
  }

  const orphaned = document.files.map(f => f.path).filter(path => !reached.has(path));
  return { orphaned, missing };
}

/**
 * Throws INCLUDE_MISMATCH unless generated and referenced files coincide
 */
export function verifyIncludes(document: NarrativeDocument): void {
  const { orphaned, missing } = checkIncludes(document);
  if (orphaned.length > 0 || missing.length > 0) {
    throw errors.includeMismatch(orphaned, missing);
  }
}
