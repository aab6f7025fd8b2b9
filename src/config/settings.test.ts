import { describe, it, expect } from 'vitest';
import { SettingsService } from './settings.js';

describe('SettingsService', (): void => {
    it('resolves defaults when no overrides exist', (): void => {
        const service = new SettingsService({});
        expect(service.snapshot('alice')).toEqual({ stm_capacity: 5, stm_windowMs: 600_000 });
        expect(service.source_resolve('alice', 'stm_capacity')).toBe('default');
    });

    it('reads environment overrides', (): void => {
        const service = new SettingsService({ MEMLOOP_STM_CAPACITY: '8', MEMLOOP_STM_WINDOW_MS: '1500' });
        expect(service.snapshot('alice')).toEqual({ stm_capacity: 8, stm_windowMs: 1500 });
        expect(service.source_resolve('alice', 'stm_windowMs')).toBe('env');
    });

    it('ignores non-numeric environment values', (): void => {
        const service = new SettingsService({ MEMLOOP_STM_CAPACITY: 'lots' });
        expect(service.value_resolve('alice', 'stm_capacity')).toBe(5);
        expect(service.source_resolve('alice', 'stm_capacity')).toBe('default');
    });

    it('applies user override over env, with clamping', (): void => {
        const service = new SettingsService({ MEMLOOP_STM_CAPACITY: '8' });
        const setResult = service.set('alice', 'stm_capacity', 5000);

        expect(setResult).toEqual({ ok: true, value: 1000 });
        expect(service.value_resolve('alice', 'stm_capacity')).toBe(1000);
        expect(service.source_resolve('alice', 'stm_capacity')).toBe('user');
    });

    it('clamps environment values to bounds', (): void => {
        const service = new SettingsService({ MEMLOOP_STM_CAPACITY: '0' });
        expect(service.value_resolve('alice', 'stm_capacity')).toBe(1);
    });

    it('isolates overrides per user', (): void => {
        const service = new SettingsService({});
        service.set('alice', 'stm_capacity', 3);
        service.set('bob', 'stm_capacity', 9);

        expect(service.value_resolve('alice', 'stm_capacity')).toBe(3);
        expect(service.value_resolve('BOB', 'stm_capacity')).toBe(9);
    });

    it('supports unsetting user override', (): void => {
        const service = new SettingsService({});
        service.set('alice', 'stm_capacity', 2);
        service.unset('alice', 'stm_capacity');
        expect(service.value_resolve('alice', 'stm_capacity')).toBe(5);
        expect(service.userSettings_get('alice')).toEqual({});
    });

    it('rejects invalid values and unknown keys', (): void => {
        const service = new SettingsService({});
        expect(service.set('alice', 'stm_capacity', 'nope').ok).toBe(false);
        expect(service.set('alice', 'color', 3)).toEqual({ ok: false, error: 'Unknown setting key: color' });
    });

    it('loads overrides from YAML', (): void => {
        const service = new SettingsService({});
        const result = service.overrides_load('alice', 'stm_capacity: 7\nstm_windowMs: 2000\n');

        expect(result).toEqual({ ok: true, applied: ['stm_capacity', 'stm_windowMs'] });
        expect(service.snapshot('alice')).toEqual({ stm_capacity: 7, stm_windowMs: 2000 });
    });

    it('treats an empty YAML document as no overrides', (): void => {
        const service = new SettingsService({});
        expect(service.overrides_load('alice', '')).toEqual({ ok: true, applied: [] });
    });

    it('rejects YAML with unknown keys without applying anything', (): void => {
        const service = new SettingsService({});
        const result = service.overrides_load('alice', 'stm_capacity: 7\ncolour: red\n');

        expect(result.ok).toBe(false);
        expect(service.userSettings_get('alice')).toEqual({});
    });

    it('rejects YAML with wrongly typed values', (): void => {
        const service = new SettingsService({});
        const result = service.overrides_load('alice', 'stm_capacity: many\n');

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.errors[0]).toMatch(/^stm_capacity: /);
        }
    });

    it('reports malformed YAML', (): void => {
        const service = new SettingsService({});
        const result = service.overrides_load('alice', 'stm_capacity: [1, 2\n');

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.errors[0]).toMatch(/^Invalid YAML: /);
        }
    });
});
