/**
 * Bundle Configuration Tests
 *
 * Checks the esbuild configuration and the bin entry without building:
 * review-core is bundled in, third-party packages stay external.
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';

const PKG_ROOT = path.resolve(__dirname, '..');
const PKG_JSON_PATH = path.join(PKG_ROOT, 'package.json');
const ESBUILD_CONFIG_PATH = path.join(PKG_ROOT, 'esbuild.config.mjs');
const ENTRY_PATH = path.join(PKG_ROOT, 'src', 'index.ts');

describe('Bundle Configuration', () => {
    const configContent = fs.readFileSync(ESBUILD_CONFIG_PATH, 'utf-8');

    it('should bundle the CLI entry point to dist/index.js', () => {
        expect(configContent).toContain("entryPoints: ['src/index.ts']");
        expect(configContent).toContain("outfile: 'dist/index.js'");
        expect(configContent).toContain("platform: 'node'");
    });

    it('should keep runtime dependencies external and review-core bundled', () => {
        expect(configContent).toContain("external: ['commander', 'highlight.js']");
        expect(configContent).not.toContain("'@clip-review/review-core'");
    });

    it('should point the bin entry at the bundle', () => {
        const pkg: unknown = JSON.parse(fs.readFileSync(PKG_JSON_PATH, 'utf-8'));
        expect(pkg).toMatchObject({ bin: { 'clip-review': 'dist/index.js' } });
    });

    it('should start the entry point with a shebang', () => {
        const entry = fs.readFileSync(ENTRY_PATH, 'utf-8');
        expect(entry.startsWith('#!/usr/bin/env node\n')).toBe(true);
    });
});
