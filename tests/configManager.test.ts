import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { CONFIG_FILE_NAME, ConfigError, ConfigManager, maskSecret } from '../src/config/ConfigManager';

describe('ConfigManager', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sleuth-config-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(contents: string, file = path.join(dir, CONFIG_FILE_NAME)): string {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, contents);
        return file;
    }

    it('should fall back to defaults when no file exists', () => {
        const config = new ConfigManager({ configPath: path.join(dir, 'missing.yaml'), env: {} });

        expect(config.getSource()).toBeNull();
        expect(config.get('maxSteps')).toBe(10);
        expect(config.get('contentCharBudget')).toBe(2000);
        expect(config.get('maxSearchResults')).toBe(5);
        expect(config.get('searchEngine')).toBe('duckduckgo');
        expect(config.get('openaiApiKey')).toBeUndefined();
    });

    it('should read the file and let environment variables win', () => {
        const file = writeConfig('maxSteps: 3\nmodelName: file-model\nheadless: true\n');

        const config = new ConfigManager({
            configPath: file,
            env: { SLEUTH_MODEL: 'env-model', SLEUTH_HEADLESS: 'no', OPENAI_API_KEY: 'test-secret' }
        });

        expect(config.getSource()).toBe(file);
        expect(config.get('maxSteps')).toBe(3);
        expect(config.get('modelName')).toBe('env-model');
        expect(config.get('headless')).toBe(false);
        expect(config.get('openaiApiKey')).toBe('test-secret');
    });

    it('should look in the data directory under the home directory', () => {
        const file = writeConfig('searchEngine: bing\n', path.join(dir, '.sleuth', CONFIG_FILE_NAME));

        const config = new ConfigManager({ homeDir: dir, env: {} });

        expect(config.getSource()).toBe(file);
        expect(config.get('searchEngine')).toBe('bing');
    });

    it('should treat an empty file as defaults', () => {
        const file = writeConfig('');

        const config = new ConfigManager({ configPath: file, env: {} });

        expect(config.getSource()).toBe(file);
        expect(config.get('maxSteps')).toBe(10);
    });

    it('should reject values outside their range', () => {
        const file = writeConfig('maxSteps: 0\n');

        expect(() => new ConfigManager({ configPath: file, env: {} })).toThrow(ConfigError);
        expect(() => new ConfigManager({ configPath: file, env: {} })).toThrow(`Invalid configuration from ${file}: maxSteps:`);
    });

    it('should reject unknown keys', () => {
        const file = writeConfig('maxStep: 4\n');

        expect(() => new ConfigManager({ configPath: file, env: {} })).toThrow(/maxStep/);
    });

    it('should reject a file that is not a mapping', () => {
        const file = writeConfig('- one\n- two\n');

        expect(() => new ConfigManager({ configPath: file, env: {} }))
            .toThrow(`Invalid configuration from ${file}: top level must be a mapping`);
    });

    it('should name a non-numeric step budget from the environment', () => {
        expect(() => new ConfigManager({ configPath: path.join(dir, 'missing.yaml'), env: { SLEUTH_MAX_STEPS: 'many' } }))
            .toThrow(/^Invalid configuration from defaults: maxSteps:/);
    });

    it('should apply overrides and skip undefined ones', () => {
        const config = new ConfigManager({ configPath: path.join(dir, 'missing.yaml'), env: {} });

        const effective = config.withOverrides({ maxSteps: 7, headless: undefined, searchEngine: 'google' });

        expect(effective.maxSteps).toBe(7);
        expect(effective.headless).toBe(true);
        expect(effective.searchEngine).toBe('google');
        expect(config.get('maxSteps')).toBe(10);
    });

    it('should validate overrides', () => {
        const config = new ConfigManager({ configPath: path.join(dir, 'missing.yaml'), env: {} });

        expect(() => config.withOverrides({ maxSteps: -1 })).toThrow(/^Invalid configuration from command line: maxSteps:/);
    });

    it('should mask the API key for display', () => {
        const config = new ConfigManager({
            configPath: path.join(dir, 'missing.yaml'),
            env: { OPENAI_API_KEY: 'test-secret-value' }
        });

        const shown = config.toDisplay();

        expect(shown.openaiApiKey).toBe('tes...alue');
        expect(shown.modelName).toBe('gpt-4o');
    });
});

describe('maskSecret', () => {
    it('should hide short secrets entirely', () => {
        expect(maskSecret('test-key')).toBe('****');
        expect(maskSecret('test-secret')).toBe('tes...cret');
    });
});
