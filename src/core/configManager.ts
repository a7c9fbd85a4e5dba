import { EventEmitter } from 'node:events';
import { watch } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import crypto from 'node:crypto';
import YAML from 'yaml';

import { describeError, type Logger } from '../ops/logger.js';

export type Plain = Record<string, unknown>;
export interface ConfigSnapshot { data: Plain; sources: Record<string, string>; hash: string; loadedAt: Date; }
export interface ConfigManagerOptions { rootDir: string; envPrefix?: string; cliOverrides?: Plain; watch?: boolean; env?: NodeJS.ProcessEnv; logger?: Logger; }

const LAYERS: Array<[string, string]> = [['engine', 'defaults.yml'], ['wizard', 'wizard.yml'], ['leagues', 'leagues.yml'], ['settlement', 'settlement.yml'], ['presenter', 'presenter.yml']];
export const isRecord = (value: unknown): value is Plain => typeof value === 'object' && value !== null && !Array.isArray(value);
const errnoCode = (error: unknown): string | undefined => (isRecord(error) && typeof error.code === 'string' ? error.code : undefined);
const merge = (target: Plain, source: Plain, sources: Record<string, string>, origin: string, prefix = ''): void => {
  for (const [key, value] of Object.entries(source)) {
    const next = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value)) {
      const existing = target[key];
      const bucket: Plain = isRecord(existing) ? existing : {};
      target[key] = bucket;
      merge(bucket, value, sources, origin, next);
    } else target[key] = value;
    sources[next] = origin;
  }
};

export class ConfigManager extends EventEmitter {
  private snapshot: ConfigSnapshot | null = null; private watcher: ReturnType<typeof watch> | null = null;
  private readonly rootDir: string; private readonly envPrefix: string; private readonly cliOverrides: Plain; private readonly watchEnabled: boolean;
  private readonly env: NodeJS.ProcessEnv; private readonly logger: Logger;

  constructor(options: ConfigManagerOptions) {
    super();
    this.rootDir = options.rootDir;
    this.envPrefix = options.envPrefix ?? 'WAGER_CONFIG';
    this.cliOverrides = options.cliOverrides ?? {};
    this.watchEnabled = options.watch ?? true;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? console;
  }

  async start(): Promise<ConfigSnapshot> {
    const snap = await this.reload();
    if (this.watchEnabled && !this.watcher) {
      const dir = path.join(this.rootDir, 'config');
      this.watcher = watch(dir, { recursive: true }, () => {
        this.reload()
          .then((next) => this.emit('reload', next))
          .catch((error: unknown) => this.logger.error(`[ConfigManager] reload failed: ${describeError(error)}`));
      });
    }
    return snap;
  }

  stop(): void { this.watcher?.close(); this.watcher = null; }

  getSnapshot(): ConfigSnapshot { if (!this.snapshot) throw new Error('Config not loaded'); return this.snapshot; }

  async reload(): Promise<ConfigSnapshot> {
    const root = path.join(this.rootDir, 'config');
    const data: Plain = {}; const sources: Record<string, string> = {};
    for (const [label, relative] of LAYERS) {
      const filePath = path.join(root, relative);
      merge(data, { [label]: await this.readConfigFile(filePath) }, sources, `file:${filePath}`);
      this.logger.info(`[ConfigManager] layer:${label} source:file ${filePath}`);
    }
    for (const [label, layer, origin] of [['env', this.readEnvOverrides(), 'env'], ['cli', this.cliOverrides, 'cli']] as const) {
      if (Object.keys(layer).length) { merge(data, layer, sources, origin); this.logger.info(`[ConfigManager] layer:${label} source:${origin}`); }
    }
    const hash = crypto.createHash('sha256').update(JSON.stringify(data)).digest('hex');
    return (this.snapshot = { data, sources, hash, loadedAt: new Date() });
  }

  private async readConfigFile(filePath: string): Promise<Plain> {
    try {
      const parsed: unknown = YAML.parse(await readFile(filePath, 'utf8'));
      return isRecord(parsed) ? parsed : {};
    } catch (error) { if (errnoCode(error) === 'ENOENT') return {}; throw error; }
  }

  private readEnvOverrides(): Plain {
    const prefix = `${this.envPrefix}__`; const overrides: Plain = {};
    for (const [rawKey, rawValue] of Object.entries(this.env)) {
      if (!rawKey.startsWith(prefix) || rawValue === undefined) continue;
      const segments = rawKey.slice(prefix.length).split('__').map((segment) => segment.toLowerCase());
      const value = this.parseEnvValue(rawValue);
      segments.reduce<Plain>((acc, segment, index) => {
        if (index === segments.length - 1) { acc[segment] = value; return acc; }
        const next = acc[segment];
        if (isRecord(next)) return next;
        const created: Plain = {};
        acc[segment] = created;
        return created;
      }, overrides);
    }
    return overrides;
  }

  private parseEnvValue(value: string): unknown {
    if (value === 'true') return true;
    if (value === 'false') return false;
    const num = Number(value);
    if (!Number.isNaN(num) && value.trim() !== '') return num;
    try { return JSON.parse(value); } catch { return value; }
  }
}
