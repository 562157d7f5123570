import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseFileConfig, resolveConfig } from '../utils/config.js';
import { configFlagsFrom, hintsFromOptions } from '../cli/options.js';
import { DEFAULT_CONFIG, scoringOptionsFrom } from '../types/index.js';

describe('configuration', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'citenet-config-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    const writeConfig = (config: unknown) =>
        fs.writeFileSync(path.join(tmpDir, 'citenet.config.json'), JSON.stringify(config));

    describe('resolveConfig', () => {
        it('should fall back to defaults without a config file', async () => {
            await expect(resolveConfig({}, tmpDir)).resolves.toEqual(DEFAULT_CONFIG);
        });

        it('should let flags override the file and the file override defaults', async () => {
            writeConfig({ sharedThreshold: 0.3, sources: ['dblp'], mailto: 'test@example.com' });

            const config = await resolveConfig({ sharedThreshold: 0.6 }, tmpDir);

            expect(config.sharedThreshold).toBe(0.6);
            expect(config.sources).toEqual(['dblp']);
            expect(config.mailto).toBe('test@example.com');
            expect(config.maxCitations).toBe(DEFAULT_CONFIG.maxCitations);
        });

        it('should reject unknown keys in the config file', async () => {
            writeConfig({ sharedThreshhold: 0.3 });
            await expect(resolveConfig({}, tmpDir)).rejects.toThrow();
        });

        it('should reject a year range that ends before it starts', async () => {
            await expect(resolveConfig({ minYear: 2023, maxYear: 2020 }, tmpDir)).rejects.toThrow(
                'minYear (2023) is after maxYear (2020)'
            );
        });
    });

    describe('parseFileConfig', () => {
        it('should accept a partial config', () => {
            expect(parseFileConfig({ resolveRelated: true, maxRelatedPerSeed: 50 })).toEqual({
                resolveRelated: true,
                maxRelatedPerSeed: 50,
            });
        });

        it('should reject out-of-range thresholds', () => {
            expect(() => parseFileConfig({ sharedThreshold: 1.5 })).toThrow();
            expect(() => parseFileConfig({ sources: [] })).toThrow();
        });
    });

    describe('configFlagsFrom', () => {
        it('should convert the flags that were given', () => {
            expect(configFlagsFrom({
                shared: '0.25',
                sources: 'Crossref, DBLP',
                minYear: '2019',
                includeUnknownYear: true,
                delay: '0',
            })).toEqual({
                sharedThreshold: 0.25,
                sources: ['crossref', 'dblp'],
                minYear: 2019,
                includeUnknownYear: true,
                rateLimitDelayMs: 0,
            });
        });

        it('should reject values the config file would reject', () => {
            expect(() => configFlagsFrom({ shared: 'lots' })).toThrow();
            expect(() => configFlagsFrom({ sources: 'crossref,arxiv' })).toThrow();
            expect(() => configFlagsFrom({ logLevel: 'verbose' })).toThrow();
        });

        it('should return an empty object without flags', () => {
            expect(configFlagsFrom({})).toEqual({});
        });
    });

    it('should extract scoring options', () => {
        expect(scoringOptionsFrom({ ...DEFAULT_CONFIG, minYear: 2000 })).toEqual({
            sharedThreshold: 0.1,
            minYear: 2000,
            maxYear: undefined,
            includeUnknownYear: false,
        });
    });

    it('should build one hint per command-line seed', () => {
        expect(hintsFromOptions({ doi: ['10.1000/a'], eid: ['42'], title: ['Graph Methods'] })).toEqual([
            { doi: '10.1000/a' },
            { eid: '42' },
            { title: 'Graph Methods' },
        ]);
    });
});
