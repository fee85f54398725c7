/**
 * Run configuration from command-line flags, environment variables and defaults.
 *
 * Flags take precedence over environment variables:
 *   --region        AWS_REGION               (default: us-east-1)
 *   --profile       AWS_PROFILE              (default: provider chain)
 *   --patterns      SECRETSWEEP_PATTERNS     (default: bundled pattern file)
 *   --services      SECRETSWEEP_SERVICES     (default: ec2,cloudformation,sagemaker,emr,codebuild,glue)
 *   --threads       SECRETSWEEP_THREADS      (default: 4)
 *   --match-mode    SECRETSWEEP_MATCH_MODE   (default: line)
 *   --show          SECRETSWEEP_SHOW=1       (default: redacted output)
 */

import { fileURLToPath } from 'url';
import { parseMatchMode, type MatchMode } from '../scanner/pattern-scanner.js';
import type { ServiceName } from '../sources/types.js';
import { ConfigError } from '../shared/errors.js';

export interface SweepConfig {
  region: string;
  profile: string | undefined;
  patternsPath: string;
  services: ServiceName[];
  /** Concurrency level of every collection. */
  threads: number;
  matchMode: MatchMode;
  /** Print matches verbatim instead of redacted. */
  showContent: boolean;
  help: boolean;
  /** Service names that were ignored because they are unknown. */
  unknownServices: string[];
}

export const ALL_SERVICES: readonly ServiceName[] = [
  'ec2', 'lambda', 'cloudformation', 'sagemaker', 'codebuild', 'glue', 'emr',
];

export const DEFAULT_SERVICES: readonly ServiceName[] = [
  'ec2', 'cloudformation', 'sagemaker', 'emr', 'codebuild', 'glue',
];

const SERVICE_ALIASES: Readonly<Record<string, ServiceName | 'all'>> = {
  all: 'all',
  cf: 'cloudformation',
  ec2: 'ec2',
  lambda: 'lambda',
  cloudformation: 'cloudformation',
  sagemaker: 'sagemaker',
  codebuild: 'codebuild',
  glue: 'glue',
  emr: 'emr',
};

export const DEFAULT_PATTERNS_PATH = fileURLToPath(new URL('../../patterns/default-patterns.json', import.meta.url));
export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_THREADS = 4;
export const DEFAULT_MATCH_MODE: MatchMode = 'line';

export const USAGE = `
🔍  SecretSweep

Usage:
  secretsweep [options]

Options:
  --region <name>       AWS region (default: ${DEFAULT_REGION})
  --profile <name>      AWS shared-config profile
  --patterns <path>     JSON file of pattern name to regular expression
  --services <list>     Comma-separated services, or 'all'
                          ec2            instance and launch template user data
                          lambda         function code and environment variables
                          cloudformation stack and stack set templates (alias: cf)
                          codebuild      source, buildspec and environment
                          glue           job scripts and arguments
                          sagemaker      processing job environment
                          emr            step and bootstrap arguments, bootstrap scripts
  --threads <n>         Concurrent detail fetches (default: ${DEFAULT_THREADS})
  --match-mode <mode>   'line' reports whole matching lines (default),
                        'all-submatches' reports every match
  --show                Show matched content instead of redacting it
  --help                Show this help message

Environment variables:
  AWS_REGION, AWS_PROFILE, SECRETSWEEP_PATTERNS, SECRETSWEEP_SERVICES,
  SECRETSWEEP_THREADS, SECRETSWEEP_MATCH_MODE, SECRETSWEEP_SHOW, LOG_LEVEL
`;

// ═══════════════════════════════════════════════════════════════
// PARSERS
// ═══════════════════════════════════════════════════════════════

/**
 * Resolves a comma-separated service list. Unknown names are returned
 * separately; `all` selects every service.
 */
export function parseServices(value: string): { services: ServiceName[]; unknown: string[] } {
  const selected = new Set<ServiceName>();
  const unknown: string[] = [];

  for (const raw of value.split(',')) {
    const name = raw.trim().toLowerCase();
    if (name.length === 0) continue;

    const service = SERVICE_ALIASES[name];
    if (service === undefined) {
      unknown.push(name);
    } else if (service === 'all') {
      ALL_SERVICES.forEach(s => selected.add(s));
    } else {
      selected.add(service);
    }
  }

  return { services: ALL_SERVICES.filter(s => selected.has(s)), unknown };
}

export function parseThreads(value: string): number {
  const threads = /^\d+$/.test(value.trim()) ? Number(value) : NaN;
  if (!Number.isSafeInteger(threads) || threads < 1) {
    throw new ConfigError(`Thread count must be a positive integer, got "${value}"`, { threads: value });
  }
  return threads;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

// ═══════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════

/**
 * Builds the run configuration.
 * @param argv - arguments after the script name
 * @throws ConfigError for invalid values or an empty service selection
 */
export function loadConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): SweepConfig {
  const getArg = (name: string): string | undefined => {
    const prefix = `--${name}=`;
    const inline = argv.find(arg => arg.startsWith(prefix));
    if (inline !== undefined) return inline.slice(prefix.length);

    const idx = argv.indexOf(`--${name}`);
    if (idx === -1) return undefined;
    const value = argv[idx + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Missing value for --${name}`, { flag: name });
    }
    return value;
  };

  const help = argv.includes('--help') || argv.includes('-h');

  const matchModeValue = getArg('match-mode') ?? env['SECRETSWEEP_MATCH_MODE'];
  const matchMode = matchModeValue === undefined ? DEFAULT_MATCH_MODE : parseMatchMode(matchModeValue);
  if (matchMode === null) {
    throw new ConfigError(`Unknown match mode "${matchModeValue}", expected 'line' or 'all-submatches'`, { matchMode: matchModeValue });
  }

  const threadsValue = getArg('threads') ?? env['SECRETSWEEP_THREADS'];
  const threads = threadsValue === undefined || help ? DEFAULT_THREADS : parseThreads(threadsValue);

  const servicesValue = getArg('services') ?? env['SECRETSWEEP_SERVICES'];
  const { services, unknown } = servicesValue === undefined
    ? { services: [...DEFAULT_SERVICES], unknown: [] }
    : parseServices(servicesValue);
  if (services.length === 0 && !help) {
    throw new ConfigError('No known service selected', { services: servicesValue, unknown });
  }

  return {
    region: getArg('region') ?? env['AWS_REGION'] ?? DEFAULT_REGION,
    profile: getArg('profile') ?? env['AWS_PROFILE'],
    patternsPath: getArg('patterns') ?? env['SECRETSWEEP_PATTERNS'] ?? DEFAULT_PATTERNS_PATH,
    services,
    threads,
    matchMode,
    showContent: argv.includes('--show') || isTruthy(env['SECRETSWEEP_SHOW']),
    help,
    unknownServices: unknown,
  };
}
