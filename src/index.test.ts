import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { hasProperty, parsePath, queryToml, resolve, parseDocument, VERSION } from './index.js';

describe('tomlraider', () => {
  describe('VERSION', () => {
    it('should match the package version', () => {
      const packageJson: unknown = JSON.parse(
        readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
      );
      const version =
        typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
          ? packageJson.version
          : undefined;
      expect(VERSION).toBe(version);
    });
  });

  describe('library API', () => {
    const content = '[tool.pdm.dev-dependencies]\ndev = ["ruff", "pre-commit"]\n';

    it('exposes the one-call query', () => {
      expect(queryToml(content, 'tool.pdm.dev-dependencies.dev[1]')).toBe('pre-commit');
      expect(hasProperty(content, 'tool.pdm.scripts')).toBe(false);
    });

    it('exposes the individual stages', () => {
      const node = resolve(parseDocument(content), parsePath('tool.pdm.dev-dependencies.dev[0]'));
      expect(node).toEqual({ kind: 'string', value: 'ruff' });
    });
  });
});
