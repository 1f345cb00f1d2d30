/**
 * Generator module index
 */

export * from './identifiers.js';
export * from './requirement-synthesizer.js';
export * from './document-assembler.js';
export * from './openapi-generator.js';
export * from './asyncapi-generator.js';
export * from './profile-pipeline.js';
export * from './profile-writer.js';
