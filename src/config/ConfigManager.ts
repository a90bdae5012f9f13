import fs from 'fs';
import yaml from 'yaml';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { SEARCH_ENGINE_NAMES } from '../tools/SearchEngineProfile';

export const CONFIG_FILE_NAME = 'sleuth.config.yaml';

export const AgentConfigSchema = z.object({
    modelName: z.string().min(1).default('gpt-4o'),
    openaiApiKey: z.string().min(1).optional(),
    oracleBaseUrl: z.string().url().default('https://api.openai.com/v1'),
    oracleTimeoutMs: z.number().int().positive().default(60000),
    oracleMaxRetries: z.number().int().min(0).max(10).default(2),
    maxSteps: z.number().int().positive().default(10),
    headless: z.boolean().default(true),
    navigationTimeoutMs: z.number().int().positive().default(30000),
    selectorTimeoutMs: z.number().int().positive().default(10000),
    contentCharBudget: z.number().int().positive().default(2000),
    minContentLength: z.number().int().min(0).default(200),
    maxSearchResults: z.number().int().positive().default(5),
    searchEngine: z.enum(SEARCH_ENGINE_NAMES).default('duckduckgo')
}).strict();

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

export class ConfigError extends Error {
    constructor(source: string, public readonly issues: string[]) {
        super(`Invalid configuration from ${source}: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export interface ConfigManagerOptions {
    /** Explicit config file; defaults to ./sleuth.config.yaml then ~/.sleuth/sleuth.config.yaml */
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    homeDir?: string;
}

const SECRET_KEYS: ReadonlySet<string> = new Set(['openaiApiKey']);

export class ConfigManager {
    private config: AgentConfig;
    private loadedFrom: string | null = null;
    private readonly pathsToTry: string[];

    constructor(private options: ConfigManagerOptions = {}) {
        const dataHome = path.join(options.homeDir ?? os.homedir(), '.sleuth');
        this.pathsToTry = options.configPath
            ? [options.configPath]
            : [path.resolve(process.cwd(), CONFIG_FILE_NAME), path.join(dataHome, CONFIG_FILE_NAME)];
        this.config = this.loadConfig();
    }

    private loadConfig(): AgentConfig {
        let fileConfig: Record<string, unknown> = {};

        // 1. First config file that exists wins
        for (const p of this.pathsToTry) {
            if (!fs.existsSync(p)) continue;
            const parsed: unknown = yaml.parse(fs.readFileSync(p, 'utf8'));
            if (parsed === null || parsed === undefined) {
                fileConfig = {};
            } else if (typeof parsed === 'object' && !Array.isArray(parsed)) {
                fileConfig = Object.fromEntries(Object.entries(parsed));
            } else {
                throw new ConfigError(p, ['top level must be a mapping']);
            }
            this.loadedFrom = p;
            logger.info(`ConfigManager: Loaded config from ${p}`);
            break;
        }

        // 2. Env vars override the file
        const envConfig = this.readEnv(this.options.env ?? process.env);

        return this.validate({ ...fileConfig, ...envConfig }, this.loadedFrom ?? 'defaults');
    }

    private readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
        const fromEnv: Record<string, unknown> = {
            openaiApiKey: env.OPENAI_API_KEY,
            modelName: env.SLEUTH_MODEL,
            oracleBaseUrl: env.SLEUTH_BASE_URL,
            headless: parseBoolean(env.SLEUTH_HEADLESS),
            maxSteps: parseInteger(env.SLEUTH_MAX_STEPS),
            searchEngine: env.SLEUTH_SEARCH_ENGINE
        };

        // Filter out unset env vars
        return Object.fromEntries(
            Object.entries(fromEnv).filter(([_, v]) => v !== undefined && v !== '')
        );
    }

    private validate(raw: Record<string, unknown>, source: string): AgentConfig {
        const parsed = AgentConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
            throw new ConfigError(source, issues);
        }
        return parsed.data;
    }

    public get<K extends keyof AgentConfig>(key: K): AgentConfig[K] {
        return this.config[key];
    }

    public getSource(): string | null {
        return this.loadedFrom;
    }

    /**
     * Effective config with per-run overrides (CLI flags) applied on top.
     * Overrides go through the same validation as the file.
     */
    public withOverrides(overrides: AgentConfigInput): AgentConfig {
        const defined = Object.fromEntries(Object.entries(overrides).filter(([_, v]) => v !== undefined));
        return this.validate({ ...this.config, ...defined }, 'command line');
    }

    /** Config with secrets masked, for display. */
    public toDisplay(config: AgentConfig = this.config): Record<string, string | number | boolean> {
        const shown: Record<string, string | number | boolean> = {};
        for (const [key, value] of Object.entries(config)) {
            if (value === undefined) continue;
            const secret = SECRET_KEYS.has(key);
            shown[key] = secret ? maskSecret(String(value)) : value;
        }
        return shown;
    }
}

export function maskSecret(value: string): string {
    if (value.length <= 8) return '****';
    return `${value.slice(0, 3)}...${value.slice(-4)}`;
}

function parseBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined || value === '') return undefined;
    const v = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return undefined;
}

/** Non-numeric text is passed through so validation names the bad variable. */
function parseInteger(value: string | undefined): number | string | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const n = Number(value);
    return Number.isFinite(n) ? n : value;
}
