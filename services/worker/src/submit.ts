#!/usr/bin/env node
/**
 * Submit bundles for validation through the queue.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Orchestrator, createLogger, parseCliArgs, validateConfig } from '@bundlehub/orchestration';
import { closeAllConnections, closeAllQueues, configureRedis } from '@bundlehub/queue';
import { config } from './config';
import { isAccepted, submitBundleValidation } from './submit-bundles';

const USAGE = `Usage: submit-bundles [options] <bundle.json...>

Options:
  --profile <url>                    Profile the bundles are validated against
  --strategy <json>                  Strategy descriptor, e.g. '{"engines":["HAPI"]}'
  --structure-definition <name=url>  Extra structure definition (repeatable)
  --code-system <name=url>           Extra code system (repeatable)
  --value-set <name=url>             Extra value set (repeatable)

Without Redis (or with FORCE_IN_MEMORY_QUEUE=true) the job runs in this process.`;

async function run(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help || options.files.length === 0) {
    console.error(USAGE);
    process.exit(options.help ? 0 : 1);
  }
  if (options.engines.length > 0) {
    throw new Error('--engine is not supported when submitting; use --strategy');
  }

  const configErrors = validateConfig(config.orchestration);
  if (configErrors.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${configErrors.join('\n  - ')}`);
  }
  const profileUrl = options.profileUrl ?? config.orchestration.profileUrl;
  if (!profileUrl) {
    throw new Error('A profile URL is required (--profile or FHIR_PROFILE_URL)');
  }

  configureRedis(config.redis);
  const logger = createLogger('Submit', config.orchestration.logging);
  const orchestrator = new Orchestrator({
    remoteValidator: config.orchestration.remoteValidator,
    logger: logger.child('Orchestrator'),
  });

  const payloads = await Promise.all(options.files.map((file) => readFile(resolve(file), 'utf-8')));
  try {
    const outcome = await submitBundleValidation(
      {
        submittedBy: process.env.USER || 'cli',
        payloads,
        profileUrl,
        strategy: options.strategy,
        structureDefinitionUrls: options.structureDefinitionUrls,
        codeSystemUrls: options.codeSystemUrls,
        valueSetUrls: options.valueSetUrls,
      },
      { orchestrator, defaults: { validationStrategy: config.orchestration.validationStrategy }, logger }
    );
    console.log(JSON.stringify(outcome, null, 2));
    if (!isAccepted(outcome)) {
      process.exitCode = 1;
    }
  } finally {
    await closeAllQueues();
    await closeAllConnections();
  }
}

run().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
