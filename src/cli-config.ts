import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';

const cliConfigSchema = z
  .object({
    $schema: z.string().optional().describe('JSON Schema reference for editor autocomplete'),
    tabStop: z.int().min(1).max(16).optional().default(8).catch(8).describe('Number of columns a tab expands to'),
    showWelcome: z.boolean().optional().default(true).catch(true).describe('Show the welcome banner when the buffer is empty'),
    logFile: z.string().nullable().optional().default(null).catch(null).describe('File that receives the debug log. Set to null to disable logging.'),
    logKeys: z.boolean().optional().default(false).catch(false).describe('Log every key the editor receives (requires logFile)'),
  })
  .meta({ title: 'Stanza Configuration', description: 'Configuration for the stanza text editor' });

export type ResolvedCliConfig = Omit<z.infer<typeof cliConfigSchema>, '$schema'>;

export const CONFIG_PATH = resolve(homedir(), '.config', 'stanza', 'config.json');

const STRIP_KEYS = new Set(['required', 'additionalProperties']);

function cleanSchema(obj: unknown, isRoot = false): unknown {
  if (Array.isArray(obj)) {
    return obj.map((item) => cleanSchema(item));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (key === 'maximum' && value === Number.MAX_SAFE_INTEGER) {
        continue;
      }
      if (isRoot && STRIP_KEYS.has(key)) {
        continue;
      }
      result[key] = cleanSchema(value);
    }
    return result;
  }
  return obj;
}

export function generateJsonSchema(): Record<string, unknown> {
  const raw = cliConfigSchema.toJSONSchema({ target: 'draft-07' });
  const cleaned = cleanSchema(raw, true);
  return z.record(z.string(), z.unknown()).parse(cleaned);
}

/** @private Exported for testing only. */
export function parseCliConfig(raw: unknown): ResolvedCliConfig {
  const { $schema: _schema, ...config } = cliConfigSchema.parse(raw);
  return config;
}

export function loadCliConfig(configPath: string = CONFIG_PATH): { config: ResolvedCliConfig; warnings: string[]; path: string | null } {
  const defaults = parseCliConfig({});

  if (!existsSync(configPath)) {
    return { config: defaults, warnings: [], path: null };
  }

  try {
    const raw: unknown = JSON.parse(readFileSync(configPath, 'utf8'));
    const config = parseCliConfig(raw);
    return { config, warnings: [], path: configPath };
  } catch {
    return { config: defaults, warnings: [`Failed to parse ${configPath}`], path: configPath };
  }
}

export function initConfig(log: (msg: string) => void, configPath: string = CONFIG_PATH): void {
  if (existsSync(configPath)) {
    log(`Config already exists at ${configPath}`);
    return;
  }

  const dir = dirname(configPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const content = JSON.stringify(parseCliConfig({}), null, 2);

  writeFileSync(configPath, `${content}\n`);
  log(`Created config at ${configPath}`);
}
