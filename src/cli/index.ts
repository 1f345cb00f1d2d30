#!/usr/bin/env node

/**
 * edr-profile-gen CLI entry point
 *
 * Generates OGC API - EDR Part 3 service profiles: requirements, abstract
 * tests, the Metanorma document, OpenAPI and AsyncAPI descriptions.
 */

import { Command } from 'commander';
import { createCommand } from './commands/create.js';
import { generateCommand } from './commands/generate.js';
import { validateCommand } from './commands/validate.js';
import { catalogCommand } from './commands/catalog.js';
import { configureLogger } from '../utils/logger.js';

const program = new Command();

// Hook to configure logger before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts();
  configureLogger({
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    noColor: opts.color === false,
    timestamps: process.env.CI === 'true' || opts.color === false,
  });
});

program
  .name('edr-profile-gen')
  .description('Generate OGC API - EDR Part 3 service profiles from a profile configuration.')
  .version('1.0.0')
  .option('-q, --quiet', 'Minimal output (errors only)', false)
  .option('-v, --verbose', 'Show debug information', false)
  .option('--no-color', 'Disable colored output (also enables timestamps)')
  .addHelpText(
    'after',
    `
Workflow:
  1. edr-profile-gen create              Answer prompts, write ./<profile-name>
  2. edit <profile-name>/profile_config.yml
  3. edr-profile-gen validate <profile-name>/profile_config.yml
  4. edr-profile-gen generate <profile-name>/profile_config.yml --output <profile-name> --force

Output:
  <profile-name>/
  ├── <profile-name>_profile.adoc
  ├── sections/
  ├── requirements/
  ├── abstract_tests/
  ├── openapi.yaml
  ├── asyncapi.yaml        (with messaging)
  ├── profile_config.yml
  ├── README.md, Makefile, metanorma.yml
`
  );

program.addCommand(createCommand);
program.addCommand(generateCommand);
program.addCommand(validateCommand);
program.addCommand(catalogCommand);

await program.parseAsync();
