import { describe, it, expect, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import fc from 'fast-check';
import {
  VERSION,
  generateAnnotations,
  getDefaultConfig,
  Logger,
  parseApiModules,
  UnknownTypeError,
} from './index.js';

function quietLogger(): Logger {
  const logger = new Logger({ component: 'IndexTest' });
  vi.spyOn(logger, 'info').mockImplementation(vi.fn());
  vi.spyOn(logger, 'warn').mockImplementation(vi.fn());
  return logger;
}

describe('API annotation generator', () => {
  describe('VERSION', () => {
    it('should match package version', () => {
      const packageJson: unknown = JSON.parse(
        readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
      );

      expect(packageJson).toMatchObject({ version: VERSION });
    });
  });

  describe('public API', () => {
    it('should generate annotations from a JSON descriptor', () => {
      const modules = parseApiModules(
        JSON.stringify({
          modules: [
            {
              namespace: 'sound',
              brief: 'Sound API',
              elements: [
                { kind: 'constant', name: 'sound.STATE_PLAYING' },
                { kind: 'constant', name: 'sound.STATE_STOPPED' },
                {
                  kind: 'function',
                  name: 'sound.get_state',
                  returns: [{ name: 'state', types: ['sound.STATE_PLAYING', 'sound.STATE_STOPPED'] }],
                },
              ],
            },
          ],
        }),
        'json'
      );

      const [unit] = generateAnnotations(modules, {
        config: getDefaultConfig(),
        version: '1.0.0',
        logger: quietLogger(),
      });

      expect(unit?.namespace).toBe('sound');
      expect(unit?.content).toContain('---@return sound.STATE|integer state \n');
      expect(unit?.content).toContain('---@alias sound.STATE\n---| `sound.STATE_PLAYING`\n---| `sound.STATE_STOPPED`');
    });

    it('should expose UnknownTypeError for strict runs', () => {
      const modules = parseApiModules(
        '{"modules":[{"namespace":"sys","elements":[{"kind":"variable","name":"sys.x"},' +
          '{"kind":"function","name":"sys.f","parameters":[{"name":"a","types":["mystery"]}]}]}]}',
        'json'
      );

      expect(() =>
        generateAnnotations(modules, {
          config: getDefaultConfig(),
          version: '1.0.0',
          logger: quietLogger(),
          strict: true,
        })
      ).toThrow(UnknownTypeError);
    });
  });

  describe('property-based tests', () => {
    it('should render every constant of a namespace as a field', () => {
      fc.assert(
        fc.property(
          fc.uniqueArray(
            fc.stringOf(fc.constantFrom('A', 'B', 'C', '_'), { minLength: 1, maxLength: 8 }).filter(
              (name) => /^[A-C]/.test(name)
            ),
            { minLength: 1, maxLength: 10 }
          ),
          (shortNames) => {
            const [unit] = generateAnnotations(
              [
                {
                  namespace: 'ns',
                  brief: 'NS',
                  description: 'NS',
                  elements: shortNames.map((name) => ({ kind: 'constant' as const, name: `ns.${name}` })),
                },
              ],
              { config: getDefaultConfig(), version: '1.0.0', logger: quietLogger() }
            );

            const fields = (unit?.content ?? '')
              .split('\n')
              .filter((line) => line.startsWith('---@field '))
              .map((line) => line.split(' ')[1]);
            return JSON.stringify(fields) === JSON.stringify(shortNames);
          }
        ),
        { numRuns: 50 }
      );
    });
  });
});
