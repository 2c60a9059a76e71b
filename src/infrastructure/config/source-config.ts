import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

type Scalar = string | number | boolean;

/**
 * Untyped source definition as read from disk and environment.
 * Validated by the bridge at start().
 */
export type RawSourceConfig = Record<string, unknown>;

export const DEFAULT_SOURCE_PATH = resolve(process.cwd(), 'config', 'source.yaml');

const SOURCE_SECTION = 'mqtt';

/** Keys typed as integers or booleans; every other value stays a string. */
const INTEGER_KEYS: ReadonlySet<string> = new Set(['port', 'qos']);
const BOOLEAN_KEYS: ReadonlySet<string> = new Set(['reject_unauthorized']);

function unquote(raw: string): string {
  if (raw.length >= 2 && ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'")))) {
    return raw.slice(1, -1);
  }
  return raw;
}

/** Types a value by its key. Anything that does not fit is left for validation to report. */
function typeValue(key: string, value: string): Scalar {
  if (INTEGER_KEYS.has(key) && /^-?\d+$/.test(value)) return Number(value);
  if (BOOLEAN_KEYS.has(key) && (value === 'true' || value === 'false')) return value === 'true';
  return value;
}

/**
 * Minimal YAML reader for flat sectioned config files.
 *
 * Handles top-level section keys with indented `key: value` scalars,
 * comments and blank lines. Values come back as strings with surrounding
 * quotes removed. Not a general-purpose YAML parser.
 */
export function parseSectionedYaml(content: string): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};
  let current: Record<string, string> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trim().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const key = line.slice(0, colonIdx).trim();

    // Top-level key (no leading whitespace) opens a section
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      current = {};
      result[key] = current;
      continue;
    }

    const value = line.slice(colonIdx + 1).trim();
    if (current && value !== '') {
      current[key] = unquote(value);
    }
  }

  return result;
}

function pick(section: Record<string, Scalar>, keys: readonly string[]): Record<string, Scalar> | undefined {
  const picked: Record<string, Scalar> = {};
  for (const key of keys) {
    const value = section[key];
    if (value !== undefined) picked[key] = value;
  }
  return Object.keys(picked).length > 0 ? picked : undefined;
}

/**
 * Loads the broker source definition.
 *
 * Reads the `mqtt` section of `config/source.yaml` (or `configPath`) and
 * applies MQTT_HOST / MQTT_PORT / MQTT_TOPIC / MQTT_USERNAME / MQTT_PASSWORD
 * overrides. A missing file yields only the environment values.
 */
export function loadSourceConfig(
  configPath: string = DEFAULT_SOURCE_PATH,
  env: NodeJS.ProcessEnv = process.env,
): RawSourceConfig {
  const fileValues: Record<string, string> = existsSync(configPath)
    ? { ...parseSectionedYaml(readFileSync(configPath, 'utf-8'))[SOURCE_SECTION] }
    : {};

  const overrides: [string, string | undefined][] = [
    ['host', env['MQTT_HOST']],
    ['port', env['MQTT_PORT']],
    ['topic', env['MQTT_TOPIC']],
    ['username', env['MQTT_USERNAME']],
    ['password', env['MQTT_PASSWORD']],
  ];
  for (const [key, value] of overrides) {
    if (value !== undefined && value !== '') {
      fileValues[key] = value;
    }
  }

  const section: Record<string, Scalar> = {};
  for (const [key, value] of Object.entries(fileValues)) {
    section[key] = typeValue(key, value);
  }

  const config: RawSourceConfig = {};
  for (const key of ['host', 'port', 'topic', 'qos', 'client_id'] as const) {
    if (section[key] !== undefined) config[key] = section[key];
  }

  const credentials = pick(section, ['username', 'password']);
  if (credentials) config['credentials'] = credentials;

  const tls = pick(section, ['ca_certs', 'client_cert', 'client_key', 'reject_unauthorized']);
  if (tls) config['tls'] = tls;

  return config;
}
