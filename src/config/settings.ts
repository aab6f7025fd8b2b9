/**
 * @file Runtime Settings Service
 *
 * User-scoped runtime settings manager with central validation and
 * deterministic precedence (user override > env > defaults).
 *
 * Overrides may also be loaded from a YAML document, validated with zod
 * before any key is applied.
 *
 * @module
 */

import yaml from 'js-yaml';
import { z } from 'zod';

export interface UserSettings {
    stm_capacity?: number;
    stm_windowMs?: number;
}

export type SettingsKey = keyof UserSettings;

export type ResolvedUserSettings = Required<UserSettings>;

export type SettingSource = 'user' | 'env' | 'default';

export type SettingSetResult = { ok: true; value: number } | { ok: false; error: string };

export type OverridesLoadResult = { ok: true; applied: SettingsKey[] } | { ok: false; errors: string[] };

interface NumericBounds {
    min: number;
    max: number;
}

export const SETTINGS_KEYS: readonly SettingsKey[] = ['stm_capacity', 'stm_windowMs'];

const ENV_KEYS: Record<SettingsKey, string> = {
    stm_capacity: 'MEMLOOP_STM_CAPACITY',
    stm_windowMs: 'MEMLOOP_STM_WINDOW_MS',
};

/** Shape accepted by `overrides_load`. Unknown keys are rejected. */
export const SettingsOverridesSchema = z.object({
    stm_capacity: z.number().int().optional(),
    stm_windowMs: z.number().int().optional(),
}).strict();

function settingsKey_is(key: string): key is SettingsKey {
    return (SETTINGS_KEYS as readonly string[]).includes(key);
}

export class SettingsService {
    private static singleton: SettingsService | null = null;
    private readonly byUser: Map<string, UserSettings> = new Map();
    private readonly defaults: ResolvedUserSettings = {
        stm_capacity: 5,
        stm_windowMs: 10 * 60 * 1000,
    };
    private readonly bounds: Record<SettingsKey, NumericBounds> = {
        stm_capacity: { min: 1, max: 1000 },
        stm_windowMs: { min: 1, max: 24 * 60 * 60 * 1000 },
    };

    /**
     * @param env - Environment to read overrides from.
     */
    constructor(private readonly env: Record<string, string | undefined> = process.env) {}

    /**
     * Resolve process-global singleton.
     */
    public static instance_get(): SettingsService {
        if (!SettingsService.singleton) {
            SettingsService.singleton = new SettingsService();
        }
        return SettingsService.singleton;
    }

    /**
     * Return effective settings for a given user.
     */
    public snapshot(user: string): ResolvedUserSettings {
        return {
            stm_capacity: this.value_resolve(user, 'stm_capacity'),
            stm_windowMs: this.value_resolve(user, 'stm_windowMs'),
        };
    }

    /**
     * Return currently persisted user overrides (without env/default resolution).
     */
    public userSettings_get(user: string): UserSettings {
        const key: string = this.userKey_normalize(user);
        return { ...(this.byUser.get(key) || {}) };
    }

    /**
     * Set one user-scoped setting with validation.
     */
    public set(user: string, key: string, value: unknown): SettingSetResult {
        if (!settingsKey_is(key)) {
            return { ok: false, error: `Unknown setting key: ${key}` };
        }

        const parsed: number = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
        if (!Number.isFinite(parsed)) {
            return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
        }

        const clamped: number = this.value_clamp(key, Math.round(parsed));
        const userKey: string = this.userKey_normalize(user);
        const next: UserSettings = { ...(this.byUser.get(userKey) || {}) };
        next[key] = clamped;
        this.byUser.set(userKey, next);
        return { ok: true, value: clamped };
    }

    /**
     * Remove one user-scoped override.
     */
    public unset(user: string, key: SettingsKey): void {
        const userKey: string = this.userKey_normalize(user);
        const current: UserSettings | undefined = this.byUser.get(userKey);
        if (!current) return;

        const next: UserSettings = { ...current };
        delete next[key];

        if (Object.keys(next).length === 0) {
            this.byUser.delete(userKey);
            return;
        }
        this.byUser.set(userKey, next);
    }

    /**
     * Resolve the effective value of one setting for one user.
     */
    public value_resolve(user: string, key: SettingsKey): number {
        const userOverride: number | undefined = this.userSettings_get(user)[key];
        if (typeof userOverride === 'number') {
            return this.value_clamp(key, userOverride);
        }

        const envOverride: number | undefined = this.envNumeric_resolve(ENV_KEYS[key]);
        if (typeof envOverride === 'number') {
            return this.value_clamp(key, envOverride);
        }

        return this.defaults[key];
    }

    /**
     * Resolve where the effective value of one setting comes from.
     */
    public source_resolve(user: string, key: SettingsKey): SettingSource {
        if (typeof this.userSettings_get(user)[key] === 'number') return 'user';
        if (typeof this.envNumeric_resolve(ENV_KEYS[key]) === 'number') return 'env';
        return 'default';
    }

    /**
     * Apply user overrides from a YAML document.
     *
     * The document is validated as a whole; nothing is applied when it
     * fails to parse or validate.
     */
    public overrides_load(user: string, yamlText: string): OverridesLoadResult {
        let raw: unknown;
        try {
            raw = yaml.load(yamlText);
        } catch (e: unknown) {
            const message: string = e instanceof Error ? e.message : String(e);
            return { ok: false, errors: [`Invalid YAML: ${message}`] };
        }

        const parsed = SettingsOverridesSchema.safeParse(raw ?? {});
        if (!parsed.success) {
            return {
                ok: false,
                errors: parsed.error.issues.map((issue: z.ZodIssue): string =>
                    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
                ),
            };
        }

        const applied: SettingsKey[] = [];
        for (const key of SETTINGS_KEYS) {
            const value: number | undefined = parsed.data[key];
            if (value === undefined) continue;
            const result: SettingSetResult = this.set(user, key, value);
            if (result.ok) applied.push(key);
        }
        return { ok: true, applied };
    }

    private envNumeric_resolve(key: string): number | undefined {
        const envRaw: string | undefined = this.env[key];
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private userKey_normalize(user: string): string {
        const normalized: string = user.trim().toLowerCase();
        return normalized || 'anonymous';
    }

    private value_clamp(key: SettingsKey, value: number): number {
        const bounds: NumericBounds = this.bounds[key];
        return Math.max(bounds.min, Math.min(bounds.max, value));
    }
}
