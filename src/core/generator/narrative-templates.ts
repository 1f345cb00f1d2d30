/**
 * Narrative templates for the profile document
 *
 * Static prose for the Metanorma (OGC flavour) section files, plus the
 * supporting README, Makefile and metanorma.yml. Only the profile clause and
 * annex A carry generated include lists; the assembler passes them in.
 */

import type { CollectionConfig, ProfileConfig } from '../../types/index.js';
import { SPEC_BASE_URI } from './identifiers.js';

export interface NarrativeContext {
  profileName: string;
  title: string;
  editor: string;
  organization: string;
  email?: string;
}

export function narrativeContext(config: ProfileConfig): NarrativeContext {
  return {
    profileName: config.profileName,
    title: config.title,
    editor: config.author ?? 'Editor Name',
    organization: config.organization ?? 'Organization Name',
    email: config.email,
  };
}

export function mainDocumentName(profileName: string): string {
  return `${profileName}_profile`;
}

export function profileClauseFile(profileName: string): string {
  return `clause_7_${profileName}.adoc`;
}

// ============================================================================
// ROOT DOCUMENT
// ============================================================================

export function renderMainDocument(ctx: NarrativeContext, sectionFiles: readonly string[]): string {
  const doc = mainDocumentName(ctx.profileName);
  const lines = [
    `= OGC API-Environmental Data Retrieval - Part 3: ${ctx.title}`,
    ':doctype: best-practice',
    ':encoding: utf-8',
    ':lang: en',
    ':status: draft',
    ':committee: technical',
    ':draft: 1.0',
    `:external-id: ${SPEC_BASE_URI}`,
    `:fullname: ${ctx.editor} (${ctx.organization})`,
    ...(ctx.email ? [`:email: ${ctx.email}`] : []),
    ':docsubtype: general',
    `:keywords: ogcdoc, OGC document, API, openapi, html, profile, ${ctx.title.toLowerCase()}`,
    `:submitting-organizations: ${ctx.organization}`,
    ':mn-document-class: ogc',
    ':mn-output-extensions: xml,html,doc,pdf',
    ':local-cache-only:',
    ':data-uri-image:',
    `:html-uri: ./${doc}.html`,
    `:pdf-uri: ./${doc}.pdf`,
    `:xml-uri: ./${doc}.xml`,
    `:doc-uri: ./${doc}.doc`,
    ':edition: 1.0',
    '',
  ];

  for (const file of sectionFiles) {
    lines.push(`include::sections/${file}[]`, '');
  }

  return lines.join('\n');
}

// ============================================================================
// SECTIONS
// ============================================================================

const PATENT_NOTICE = `Attention is drawn to the possibility that some of the elements of this document may be the subject of patent rights. The Open Geospatial Consortium shall not be held responsible for identifying any or all such patent rights.

Recipients of this document are requested to submit, with their comments, notification of any relevant patent claims or other intellectual property rights of which they may be aware that might be infringed by any implementation of the standard set forth in this document, and to provide supporting documentation.`;

export function renderFrontMaterial(ctx: NarrativeContext): string {
  return `.Preface

${PATENT_NOTICE}

[abstract]
== Abstract

The aim of the ${ctx.title} service profile is to provide a standard interface for accessing ${ctx.title.toLowerCase()} data based on OGC API-EDR standard.

== Security considerations

No security considerations have been made for this Service Profile.

== Submitters

All questions regarding this submission should be directed to the editor or the submitters:

.Submitters
|===
|*${ctx.editor}* |*${ctx.organization}*
|===
`;
}

export function renderScope(ctx: NarrativeContext): string {
  return `== Scope

This profile extends OGC API - Environmental Data Retrieval (EDR) Part 1 for ${ctx.title.toLowerCase()} applications.

The profile defines:

* Collection structure for ${ctx.title.toLowerCase()} data
* Query patterns and parameters
* Response formats and schemas
`;
}

export function renderConformance(ctx: NarrativeContext): string {
  return `== Conformance

Conformance to the ${ctx.title} (this document) can be tested by inspection. The test suite is provided in <<annex-A>>.

This Standard contains normative language and thus places requirements on conformance, or mechanism for adoption, of candidate standards to which this Standard applies. In particular:

* <<core-section,OGC API-EDR Requirements Class: Core>> specifies the core requirements which shall be met by all standards claiming conformance to this Standard.
`;
}

export function renderReferences(messaging: boolean): string {
  const refs = [
    '* [[[ogc19-086,OGC 19-086r6]]], OGC API - Environmental Data Retrieval Standard - Part 1: Core',
  ];
  if (messaging) {
    refs.push('* [[[ogc23-057,OGC 23-057]]], OGC API - Environmental Data Retrieval Standard - Part 2: Publish-Subscribe workflow');
  }
  return `[bibliography]
== Normative References

The following normative documents contain provisions that, through reference in this text, constitute provisions of this document.

${refs.join('\n')}
`;
}

export function renderTerms(): string {
  return `== Terms and Definitions

For the purposes of this document, the terms and definitions given in OGC API - EDR Part 1 apply.
`;
}

export function renderConventions(ctx: NarrativeContext): string {
  return `== Conventions

This document uses the standard conventions defined in OGC API - Common.

=== Identifiers

The normative provisions in this standard are denoted by the URI:

\`${SPEC_BASE_URI}\`

Requirements of this profile are identified below \`/req/${ctx.profileName}\` and abstract tests below \`/conf/${ctx.profileName}\`.
`;
}

export function renderContext(ctx: NarrativeContext): string {
  return `== Context

=== Overview

This profile addresses ${ctx.title.toLowerCase()} use cases requiring standardized access to environmental data.
`;
}

export function renderCollectionsSummary(collections: readonly CollectionConfig[]): string {
  return collections
    .map(c => {
      const lines = [
        `==== ${c.name}`,
        '',
        `Query types: ${c.queryTypes.join(', ')}`,
        '',
        `Output formats: ${c.formats.length > 0 ? c.formats.join(', ') : 'none declared'}`,
        '',
      ];
      if (c.properties.length > 0) {
        lines.push(`Feature properties: ${c.properties.join(', ')}`, '');
      }
      return lines.join('\n');
    })
    .join('\n');
}

export function renderProfileClause(
  ctx: NarrativeContext,
  collectionsSummary: string,
  requirementsClassInclude: string,
  requirementIncludes: readonly string[]
): string {
  return `[[core-section]]
== ${ctx.title}

${requirementsClassInclude}

=== Overview

This profile extends OGC API - EDR Part 1 to support ${ctx.title.toLowerCase()} data access patterns.

=== Collections

This profile defines the following collections:

${collectionsSummary}
=== Requirements

${requirementIncludes.join('\n\n')}

=== Platform Resources

OGC API - Common defines a set of common capabilities which are applicable to any OGC Web API.

.Platform Resource Paths
[width="100%",options="header"]
|====================
|PATH TEMPLATE |METHOD |RESOURCE
|\\{root}/ |GET |Landing page
|\\{root}/api |GET |API Description
|\\{root}/conformance |GET |Conformance Classes
|====================

=== General Requirements

==== HTTP Status Codes

HTTP response status codes SHALL conform to OGC API - Common standards.

==== Links

Response links SHALL conform to OGC API - Common standards.
`;
}

export function renderAnnexA(conformanceClassInclude: string, testIncludes: readonly string[]): string {
  return `[[annex-A]]
[appendix]
== Conformance Class Abstract Test Suite (Normative)

=== Conformance Class Core

${conformanceClassInclude}

${testIncludes.join('\n\n')}
`;
}

export function renderHistory(ctx: NarrativeContext): string {
  return `[appendix]
== Revision History

.Revision History
[width="90%",options="header"]
|===
|Date |Release |Editor | Primary clauses modified |Description
|YYYY-MM-DD |0.1 |${ctx.editor} |all |initial version
|===
`;
}

export function renderBibliography(messaging: boolean): string {
  const entries = ['* [[[ogc-edr,OGC EDR]]], OGC API - EDR. https://ogcapi.ogc.org/edr/'];
  if (messaging) {
    entries.unshift('* [[[asyncapi,AsyncAPI]]], AsyncAPI Specification. https://www.asyncapi.com/');
  }
  return `[bibliography]
== Bibliography

${entries.join('\n')}
`;
}

// ============================================================================
// SUPPORTING FILES
// ============================================================================

export function renderReadme(config: ProfileConfig): string {
  const collections = config.collections
    .map(
      c =>
        `- **${c.name}**: \`/collections/${c.name}\` (Query types: ${c.queryTypes.join(', ')}; Formats: ${c.formats.join(', ') || 'none'})`
    )
    .join('\n');

  const structure = [
    '- `requirements/` - Requirements definitions',
    '- `abstract_tests/` - Abstract test definitions',
    '- `sections/` - Documentation sections',
    '- `openapi.yaml` - HTTP API description',
    ...(config.includeMessaging ? ['- `asyncapi.yaml` - PubSub description'] : []),
    '- `profile_config.yml` - Configuration that regenerates this profile',
  ];

  const validate = ['# OpenAPI', 'schemathesis run -u http://localhost:5000 openapi.yaml'];
  if (config.includeMessaging) {
    validate.push('', '# AsyncAPI', 'asyncapi validate asyncapi.yaml');
  }

  return `# ${config.title}

OGC API - EDR Part 3 Service Profile

## Structure

${structure.join('\n')}

## Generate PDF

\`\`\`bash
make
\`\`\`

## Validate

\`\`\`bash
${validate.join('\n')}
\`\`\`

## Regenerate

\`\`\`bash
edr-profile-gen generate profile_config.yml --output . --force
\`\`\`

## Collections

${collections}
`;
}

export function renderMakefile(profileName: string): string {
  const doc = mainDocumentName(profileName);
  return `all: pdf

pdf:
\tdocker run --rm \\
\t  -v "$$(pwd)":/metanorma \\
\t  -v \${HOME}/.fontist/fonts/:/config/fonts \\
\t  metanorma/metanorma metanorma compile \\
\t  --agree-to-terms -t ogc -x pdf,html,doc ${doc}.adoc

clean:
\trm -f ${doc}.pdf ${doc}.html ${doc}.doc ${doc}.xml

.PHONY: all pdf clean
`;
}

export function renderMetanormaConfig(email?: string): string {
  return `---
metanorma:
  deploy:
    email: "${email ?? 'ci@metanorma.org'}"
`;
}
