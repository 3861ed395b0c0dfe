/**
 * @file Run Settings Service
 *
 * Run-scoped settings with central validation and deterministic
 * precedence (explicit > env > config file > defaults).
 *
 * Environment variables are the upper-cased field name under a `CAIRN_`
 * prefix (`CAIRN_OVERWRITE_STAGES=train,test`). The config file is YAML
 * (`cairn.yaml` in the working directory unless another path is given).
 *
 * @module
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage_get } from '../dag/errors.js';

export const RunSettingsSchema = z.object({
    experiment_name:    z.string().min(1).default('experiment'),
    custom_prefix:      z.string().min(1).nullable().default(null),
    cache_path:         z.string().min(1).default('data/cache'),
    runs_path:          z.string().min(1).default('data/runs'),
    manager_cache_path: z.string().min(1).default('data'),
    overwrite:          z.boolean().default(false),
    overwrite_stages:   z.array(z.string()).default([]),
    lazy:               z.boolean().default(false),
    ignore_lazy:        z.boolean().default(false),
    dry:                z.boolean().default(false),
    dry_cache:          z.boolean().default(false),
    store_full:         z.boolean().default(false),
    dag:                z.boolean().default(true),
    continue_on_error:  z.boolean().default(false),
    retain_lazy:        z.boolean().default(true),
    hash_algorithm:     z.enum(['md5', 'sha1', 'sha256']).default('md5'),
    parallel_mode:      z.boolean().default(false),
    log_level:          z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type RunSettings = z.infer<typeof RunSettingsSchema>;

/** Settings as accepted before defaults are applied. */
export type RunSettingsInput = z.input<typeof RunSettingsSchema>;

export type SettingsKey = keyof RunSettings;

export type SettingSource = 'explicit' | 'env' | 'file' | 'default';

type SettingsLayer = Partial<RunSettings>;

const LayerSchema = RunSettingsSchema.partial().strict();

export const DEFAULT_CONFIG_FILE = 'cairn.yaml';

const ENV_PREFIX = 'CAIRN_';

/**
 * @property overrides - Explicit values; highest precedence
 * @property env - Environment to read (defaults to `process.env`)
 * @property configPath - YAML file to read; `null` disables the file layer
 */
export interface SettingsServiceOptions {
    overrides?: SettingsLayer;
    env?: Record<string, string | undefined>;
    configPath?: string | null;
}

export class SettingsService {
    private readonly defaults: RunSettings = RunSettingsSchema.parse({});
    private readonly explicit: SettingsLayer;
    private readonly fromEnv: SettingsLayer;
    private readonly fromFile: SettingsLayer;

    constructor(options: SettingsServiceOptions = {}) {
        this.explicit = layer_validate(options.overrides ?? {}, 'explicit settings');
        this.fromEnv = this.envLayer_resolve(options.env ?? process.env);
        this.fromFile = options.configPath === undefined
            ? fileLayer_load(DEFAULT_CONFIG_FILE, false)
            : fileLayer_load(options.configPath, true);
    }

    /**
     * Return effective settings.
     */
    public snapshot(): RunSettings {
        return RunSettingsSchema.parse({ ...this.fromFile, ...this.fromEnv, ...this.explicit });
    }

    /**
     * Set one explicit setting with validation.
     */
    public set<K extends SettingsKey>(key: K, value: unknown): { ok: true; value: RunSettings[K] } | { ok: false; error: string } {
        if (!(key in RunSettingsSchema.shape)) {
            return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }
        const candidate = LayerSchema.safeParse({ ...this.explicit, [key]: value });
        if (!candidate.success) {
            return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
        }
        Object.assign(this.explicit, candidate.data);
        return { ok: true, value: this.snapshot()[key] };
    }

    /**
     * Remove one explicit override.
     */
    public unset(key: SettingsKey): void {
        delete this.explicit[key];
    }

    /**
     * Which layer supplies the effective value of `key`.
     */
    public source_get(key: SettingsKey): SettingSource {
        if (this.explicit[key] !== undefined) return 'explicit';
        if (this.fromEnv[key] !== undefined) return 'env';
        if (this.fromFile[key] !== undefined) return 'file';
        return 'default';
    }

    private envLayer_resolve(env: Record<string, string | undefined>): SettingsLayer {
        const raw: Record<string, unknown> = {};
        for (const key of Object.keys(RunSettingsSchema.shape)) {
            const value: string | undefined = env[`${ENV_PREFIX}${key.toUpperCase()}`];
            if (value === undefined || value === '') continue;
            raw[key] = envValue_coerce(Reflect.get(this.defaults, key), value);
        }
        return layer_validate(raw, 'environment');
    }
}

// ─── Layer Helpers ──────────────────────────────────────────────

/** Shape an env string like the field's default value. */
function envValue_coerce(defaultValue: unknown, raw: string): unknown {
    if (typeof defaultValue === 'boolean') {
        if (/^(1|true|yes|on)$/i.test(raw)) return true;
        if (/^(0|false|no|off)$/i.test(raw)) return false;
        return raw;
    }
    if (Array.isArray(defaultValue)) {
        return raw.split(',').map((item: string): string => item.trim()).filter(Boolean);
    }
    return raw;
}

function layer_validate(raw: unknown, origin: string): SettingsLayer {
    const parsed = LayerSchema.safeParse(raw);
    if (!parsed.success) {
        const issues: string = parsed.error.issues
            .map((issue: z.ZodIssue): string => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid ${origin}: ${issues}`, { origin });
    }
    return parsed.data;
}

/**
 * Read the YAML config file. A missing default file is not an error;
 * a missing file that was asked for by name is.
 */
function fileLayer_load(configPath: string | null, required: boolean): SettingsLayer {
    if (configPath === null) return {};
    if (!fs.existsSync(configPath)) {
        if (required) {
            throw new ConfigurationError(`Config file '${configPath}' does not exist`, { path: configPath });
        }
        return {};
    }
    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(configPath, 'utf-8'));
    } catch (error: unknown) {
        throw new ConfigurationError(`Config file '${configPath}' is not valid YAML: ${errorMessage_get(error)}`, {
            path: configPath,
        });
    }
    if (raw === undefined || raw === null) return {};
    return layer_validate(raw, `config file '${configPath}'`);
}
