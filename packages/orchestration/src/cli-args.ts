import type { ResourceUrlMap } from './engines';

export interface CliOptions {
  files: string[];
  profileUrl?: string;
  strategy?: string;
  engines: string[];
  structureDefinitionUrls: ResourceUrlMap;
  codeSystemUrls: ResourceUrlMap;
  valueSetUrls: ResourceUrlMap;
  out?: string;
  help: boolean;
}

const VALUE_FLAGS = new Set([
  '--profile',
  '--strategy',
  '--engine',
  '--structure-definition',
  '--code-system',
  '--value-set',
  '--out',
]);

function getArgs(argv: readonly string[], flag: string): string[] {
  const values: string[] = [];
  argv.forEach((arg, index) => {
    const value = argv[index + 1];
    if (arg === flag && value !== undefined) values.push(value);
  });
  return values;
}

function getArg(argv: readonly string[], flag: string): string | undefined {
  return getArgs(argv, flag).at(-1);
}

/**
 * `name=url` pairs into a map.
 * @throws Error when a pair has no `=`
 */
function toUrlMap(flag: string, pairs: string[]): ResourceUrlMap {
  const map: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`${flag} expects name=url (got "${pair}")`);
    }
    map[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return map;
}

/**
 * Parse arguments (without the node and script entries). Positional arguments
 * are bundle files.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const files: string[] = [];
  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    if (VALUE_FLAGS.has(arg)) {
      index++;
    } else if (!arg.startsWith('--')) {
      files.push(arg);
    }
  }

  return {
    files,
    profileUrl: getArg(argv, '--profile'),
    strategy: getArg(argv, '--strategy'),
    engines: getArgs(argv, '--engine'),
    structureDefinitionUrls: toUrlMap('--structure-definition', getArgs(argv, '--structure-definition')),
    codeSystemUrls: toUrlMap('--code-system', getArgs(argv, '--code-system')),
    valueSetUrls: toUrlMap('--value-set', getArgs(argv, '--value-set')),
    out: getArg(argv, '--out'),
    help: argv.includes('--help'),
  };
}
