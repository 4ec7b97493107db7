#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseCliArgs } from './cli-args';
import { loadEnvFile, loadOrchestrationConfigFromEnv, validateConfig } from './config';
import { createLogger } from './logger';
import { Orchestrator } from './orchestrator';
import { toSessionRecord } from './serialization';

const USAGE = `Usage: bundle-validate [options] <bundle.json...>

Options:
  --profile <url>                    Profile the bundles are validated against
  --strategy <json>                  Strategy descriptor, e.g. '{"engines":["HAPI"]}'
  --engine <type>                    local-rule | embedded-reference | remote-api (repeatable)
  --structure-definition <name=url>  Extra structure definition (repeatable)
  --code-system <name=url>           Extra code system (repeatable)
  --value-set <name=url>             Extra value set (repeatable)
  --out <file>                       Write the session record to a file`;

async function outputResult(result: unknown, outFile: string | undefined): Promise<void> {
  const json = JSON.stringify(result, null, 2);
  if (outFile) {
    await writeFile(resolve(outFile), json);
    return;
  }
  console.log(json);
}

async function run(): Promise<void> {
  loadEnvFile();
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help || options.files.length === 0) {
    console.error(USAGE);
    process.exit(options.help ? 0 : 1);
  }

  const config = loadOrchestrationConfigFromEnv();
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${configErrors.join('\n  - ')}`);
  }

  const logger = createLogger('BundleValidate', config.logging);
  const orchestrator = new Orchestrator({ remoteValidator: config.remoteValidator, logger });

  const payloads = await Promise.all(options.files.map((file) => readFile(resolve(file), 'utf-8')));
  const builder = orchestrator
    .session()
    .withPayloads(payloads)
    .withStructureDefinitionUrls(options.structureDefinitionUrls)
    .withCodeSystemUrls(options.codeSystemUrls)
    .withValueSetUrls(options.valueSetUrls);

  const profileUrl = options.profileUrl ?? config.profileUrl;
  if (profileUrl) builder.withProfileUrl(profileUrl);

  for (const engine of options.engines) {
    builder.addEngine(engine);
  }
  const strategy = options.strategy ?? (options.engines.length === 0 ? config.validationStrategy : undefined);
  if (strategy) builder.withValidationStrategy(strategy);
  for (const issue of builder.getStrategyIssues()) {
    logger.warn(issue);
  }

  const session = builder.build();
  await orchestrator.orchestrate(session);

  if (session.engines.length === 0) {
    logger.warn('No validation engine was selected; the payloads were not validated');
  }

  const record = toSessionRecord(session);
  await outputResult(record, options.out);
  if (!record.valid) {
    process.exitCode = 1;
  }
}

run().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
