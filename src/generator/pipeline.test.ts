import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { ApiElement, ApiModule } from '../api/types.js';
import { getDefaultConfig } from '../config/parser.js';
import type { Config } from '../config/types.js';
import { UnknownTypeError } from '../engine/type-renderer.js';
import { Logger } from '../utils/logger.js';
import { MemoryEmitter } from './emitter.js';
import { generateAndWriteAnnotations, generateAnnotations, mergeModules } from './pipeline.js';
import { GeneratorError } from './types.js';

const HEADER_PREFIX = '--[[\n  Generated with https://example.com/api-annotations\n  API 1.0.0\n\n';
const DIAGNOSTICS = '---@meta\n---@diagnostic disable: lowercase-global';

function testConfig(): Config {
  const config = getDefaultConfig();
  config.output.disabled_diagnostics = ['lowercase-global'];
  return config;
}

function quietLogger(): { logger: Logger; info: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn> } {
  const logger = new Logger({ component: 'PipelineTest' });
  const info = vi.fn();
  const warn = vi.fn();
  vi.spyOn(logger, 'info').mockImplementation(info);
  vi.spyOn(logger, 'warn').mockImplementation(warn);
  return { logger, info, warn };
}

function module(namespace: string, elements: readonly ApiElement[], brief = `${namespace} API`): ApiModule {
  return { namespace, brief, description: brief, elements };
}

function constants(...names: string[]): ApiElement[] {
  return names.map((name) => ({ kind: 'constant', name }));
}

function generate(modules: readonly ApiModule[], strict = false): Map<string, string> {
  const { logger } = quietLogger();
  const units = generateAnnotations(modules, { config: testConfig(), version: '1.0.0', logger, strict });
  return new Map(units.map((unit) => [unit.namespace, unit.content]));
}

describe('mergeModules', () => {
  it('should concatenate elements of modules sharing a namespace', () => {
    const merged = mergeModules([
      module('go', constants('go.A_X')),
      module('gui', constants('gui.B_X')),
      module('go', constants('go.A_Y')),
    ]);

    expect(merged.map((m) => m.namespace)).toEqual(['go', 'gui']);
    expect(merged[0]?.elements.map((e) => e.name)).toEqual(['go.A_X', 'go.A_Y']);
  });

  it('should take a detailed description from a later module', () => {
    const merged = mergeModules([
      { namespace: 'go', brief: 'Game object', description: 'Game object', elements: [] },
      { namespace: 'go', brief: 'Go', description: 'Game object functions', elements: [] },
      { namespace: 'go', brief: 'Same', description: 'Same', elements: [] },
    ]);

    expect(merged).toHaveLength(1);
    expect(merged[0]?.brief).toBe('Game object');
    expect(merged[0]?.description).toBe('Game object functions');
  });

  it('should name an anonymous module after its first element', () => {
    const merged = mergeModules([module('', constants('font.FLAG_A', 'font.FLAG_B'))]);

    expect(merged[0]?.namespace).toBe('font');
  });

  it('should not modify its inputs', () => {
    const first = module('go', constants('go.A_X'));
    mergeModules([first, module('go', constants('go.A_Y'))]);

    expect(first.elements).toHaveLength(1);
  });
});

describe('generateAnnotations', () => {
  it('should render constants as fields with a prefix alias', () => {
    const units = generate([
      module('colors', [
        { kind: 'constant', name: 'colors.RGB_RED', description: 'red' },
        ...constants('colors.RGB_GREEN', 'colors.RGB_BLUE'),
      ]),
    ]);

    expect(units.get('colors')).toBe(
      HEADER_PREFIX +
        '  colors API\n--]]\n\n' +
        DIAGNOSTICS +
        '\n\n' +
        [
          '---@class api.colors',
          '---red',
          '---@field RGB_RED integer',
          '---@field RGB_GREEN integer',
          '---@field RGB_BLUE integer',
          'colors = {}',
          '',
          '---@alias colors.RGB',
          '---| `colors.RGB_BLUE`',
          '---| `colors.RGB_GREEN`',
          '---| `colors.RGB_RED`',
          '',
          'return colors',
          '',
        ].join('\n')
    );
  });

  it('should order declarations by kind, then name', () => {
    const units = generate([
      module('vmath', [
        { kind: 'alias', name: 'vmath.scalar', definition: 'number' },
        {
          kind: 'function',
          name: 'vmath.dot',
          description: 'dot product',
          parameters: [{ name: 'a', doc: 'first', types: ['vector3'] }],
          returns: [{ name: 'd', doc: 'result', types: ['number'] }],
        },
        { kind: 'variable', name: 'vmath.epsilon', description: 'tolerance' },
        { kind: 'alias', name: 'vmath.angle', definition: 'number' },
      ]),
    ]);

    const content = units.get('vmath') ?? '';
    expect(content.slice(content.indexOf('---@class'))).toBe(
      [
        '---@class api.vmath',
        'vmath = {}',
        '',
        '---tolerance',
        'vmath.epsilon = nil',
        '',
        '---dot product',
        '---@param a vector3 first',
        '---@return number d result',
        'function vmath.dot(a) end',
        '',
        '---@alias vmath.angle number',
        '---@alias vmath.scalar number',
        '',
        'return vmath',
        '',
      ].join('\n')
    );
  });

  it('should emit the body bare when no element belongs to the namespace', () => {
    const units = generate([
      module('builtins', [
        { kind: 'class', name: 'vector3', fields: { x: 'number' }, global: false, operators: {} },
      ]),
    ]);

    expect(units.get('builtins')).toBe(
      `${HEADER_PREFIX}  builtins API\n--]]\n\n${DIAGNOSTICS}\n\n---@class vector3\n---@field x number\n`
    );
  });

  it('should render multi-level namespaces', () => {
    const content = generate([module('foo.bar', constants('foo.bar.SETTING_A', 'foo.bar.SETTING_B'))]).get(
      'foo.bar'
    );

    expect(content).toContain(
      '---@class api.foo.bar\n---@field SETTING_A integer\n---@field SETTING_B integer\nfoo.bar = {}\n'
    );
    expect(content).toContain(
      '---@alias foo.bar.SETTING\n---| `foo.bar.SETTING_A`\n---| `foo.bar.SETTING_B`'
    );
    expect(content).toContain('return foo.bar\n');
  });

  it('should substitute aliases for literal constant references', () => {
    const content = generate([
      module('buffer', [
        ...constants('buffer.VALUE_TYPE_UINT8', 'buffer.VALUE_TYPE_FLOAT32'),
        {
          kind: 'function',
          name: 'buffer.get_type',
          parameters: [
            { name: 'wanted', doc: 'type', types: ['buffer.VALUE_TYPE_UINT8', 'buffer.VALUE_TYPE_FLOAT32'] },
          ],
          returns: [
            {
              name: 'kind',
              doc: 'found type',
              types: ['buffer.VALUE_TYPE_UINT8', 'buffer.VALUE_TYPE_FLOAT32', 'nil'],
            },
          ],
        },
      ]),
    ]).get('buffer');

    expect(content).toContain('---@param wanted buffer.VALUE_TYPE|integer type\n');
    expect(content).toContain('---@return buffer.VALUE_TYPE|nil|integer kind found type\n');
    expect(content).toContain('---@alias buffer.VALUE_TYPE\n');
    expect(content).not.toContain('---@alias buffer.VALUE\n');
  });

  it('should emit aliases created from a later namespace', () => {
    const units = generate([
      module(
        'gui',
        constants(
          'gui.PLAYBACK_LOOP_FORWARD',
          'gui.PLAYBACK_LOOP_BACKWARD',
          'gui.PLAYBACK_ONCE_FORWARD',
          'gui.PLAYBACK_ONCE_BACKWARD',
          'gui.PLAYBACK_ONCE_PINGPONG'
        )
      ),
      module('sprite', [
        {
          kind: 'function',
          name: 'sprite.play',
          parameters: [
            { name: 'playback', doc: 'one of <code>gui.PLAYBACK_*</code>', types: ['string', 'constant'] },
          ],
          returns: [],
        },
      ]),
    ]);

    expect(units.get('sprite')).toContain(
      '---@param playback string|gui.PLAYBACK one of `gui.PLAYBACK_*`\n'
    );

    const gui = units.get('gui');
    expect(gui).toContain('---@field PLAYBACK_ONCE_PINGPONG string\ngui = {}\n');
    expect(gui).toContain(
      [
        '---@alias gui.PLAYBACK',
        '---| `gui.PLAYBACK_LOOP_BACKWARD`',
        '---| `gui.PLAYBACK_LOOP_FORWARD`',
        '---| `gui.PLAYBACK_ONCE_BACKWARD`',
        '---| `gui.PLAYBACK_ONCE_FORWARD`',
        '---| `gui.PLAYBACK_ONCE_PINGPONG`',
        '',
        '---@alias gui.PLAYBACK_LOOP',
        '---| `gui.PLAYBACK_LOOP_BACKWARD`',
        '---| `gui.PLAYBACK_LOOP_FORWARD`',
        '',
        '---@alias gui.PLAYBACK_ONCE',
      ].join('\n')
    );
  });

  it('should keep the alias in the namespace that declares the constants', () => {
    const units = generate([
      module(
        'graphics',
        constants(
          'graphics.BUFFER_TYPE_COLOR0_BIT',
          'graphics.BUFFER_TYPE_COLOR1_BIT',
          'graphics.BUFFER_TYPE_DEPTH_BIT'
        )
      ),
      module('render', [
        {
          kind: 'function',
          name: 'render.set_target',
          parameters: [
            {
              name: 'buffer_type',
              doc: 'target buffer',
              types: [
                'graphics.BUFFER_TYPE_COLOR0_BIT',
                'graphics.BUFFER_TYPE_COLOR1_BIT',
                'graphics.BUFFER_TYPE_DEPTH_BIT',
              ],
            },
          ],
          returns: [],
        },
      ]),
    ]);

    expect(units.get('render')).toContain(
      '---@param buffer_type graphics.BUFFER_TYPE|integer target buffer\n'
    );
    expect(units.get('render')).not.toContain('---@alias');
    expect(units.get('graphics')).toContain('---@alias graphics.BUFFER_TYPE\n');
  });

  it('should return units sorted by namespace', () => {
    const { logger } = quietLogger();
    const units = generateAnnotations(
      [module('sys', constants('sys.A_B')), module('go', constants('go.A_B')), module('gui', [])],
      { config: testConfig(), version: '1.0.0', logger }
    );

    expect(units.map((unit) => unit.namespace)).toEqual(['go', 'sys']);
  });

  it('should skip modules without renderable elements', () => {
    const { logger, info } = quietLogger();
    const units = generateAnnotations(
      [module('msg', [{ kind: 'unsupported', name: 'msg.post', sourceKind: 'message' }])],
      { config: testConfig(), version: '1.0.0', logger }
    );

    expect(units).toEqual([]);
    expect(info).toHaveBeenCalledWith('module_skipped', {
      namespace: 'msg',
      reason: 'no_renderable_elements',
    });
  });

  it('should substitute the sentinel for unknown types', () => {
    const { logger, warn } = quietLogger();
    const [unit] = generateAnnotations(
      [
        module('sys', [
          {
            kind: 'function',
            name: 'sys.open',
            parameters: [{ name: 'handle', types: ['mystery'] }],
            returns: [],
          },
        ]),
      ],
      { config: testConfig(), version: '1.0.0', logger }
    );

    expect(unit?.content).toContain('---@param handle any \n');
    expect(warn).toHaveBeenCalledWith('unknown_type', {
      type: 'mystery',
      element: 'sys.open',
      parameter: 'handle',
      replacement: 'any',
    });
  });

  it('should throw UnknownTypeError in strict mode', () => {
    const modules = [
      module('sys', [
        {
          kind: 'function',
          name: 'sys.open',
          parameters: [{ name: 'handle', types: ['mystery'] }],
          returns: [],
        },
      ]),
    ];

    expect(() => generate(modules, true)).toThrow(UnknownTypeError);
    expect(() => generate(modules, true)).toThrow("Unknown type 'mystery' in 'sys.open'");
  });

  it('should produce identical output for identical input', () => {
    const modules = [
      module('gui', constants('gui.PROP_POSITION', 'gui.PROP_SCALE', 'gui.EASING_LINEAR', 'gui.EASING_INQUAD')),
      module('go', [
        {
          kind: 'function',
          name: 'go.animate',
          parameters: [{ name: 'easing', doc: '<code>gui.EASING_*</code>', types: ['constant'] }],
          returns: [],
        },
      ]),
    ];

    expect(generate(modules)).toEqual(generate(modules));
  });
});

describe('generateAndWriteAnnotations', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'annotations-pipeline-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeModules(content: string): Promise<string> {
    const path = join(tempDir, 'modules.toml');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  const COLORS_TOML = `
[[modules]]
namespace = "colors"
brief = "Colors API"

[[modules.elements]]
kind = "constant"
name = "colors.RGB_RED"

[[modules.elements]]
kind = "constant"
name = "colors.RGB_BLUE"
`;

  it('should write one file per namespace', async () => {
    const path = await writeModules(COLORS_TOML);
    const config = testConfig();
    config.output.folder = join(tempDir, 'out');
    const { logger } = quietLogger();

    const units = await generateAndWriteAnnotations({ files: [path], config, version: '1.0.0', logger });

    const written = await readFile(join(tempDir, 'out', 'colors.lua'), 'utf-8');
    expect(units.map((unit) => unit.namespace)).toEqual(['colors']);
    expect(written).toBe(units[0]?.content);
  });

  it('should hand units to a custom emitter', async () => {
    const path = await writeModules(COLORS_TOML);
    const emitter = new MemoryEmitter();
    const { logger } = quietLogger();

    await generateAndWriteAnnotations({ files: [path], config: testConfig(), version: '1.0.0', logger, emitter });

    expect(emitter.namespaces).toEqual(['colors']);
    expect(emitter.get('colors')).toContain('---@alias colors.RGB\n');
  });

  it('should report an invalid configuration as CONFIG_ERROR', async () => {
    const path = await writeModules(COLORS_TOML);
    const config = testConfig();
    config.types.unknown = '';
    const { logger } = quietLogger();

    await expect(
      generateAndWriteAnnotations({ files: [path], config, version: '1.0.0', logger, emitter: new MemoryEmitter() })
    ).rejects.toMatchObject({ name: 'GeneratorError', code: 'CONFIG_ERROR' });
  });

  it('should report a malformed module file as MODULE_PARSE_ERROR', async () => {
    const path = await writeModules('[[modules]]\nnamespace = 3\n');
    const { logger } = quietLogger();

    await expect(
      generateAndWriteAnnotations({
        files: [path],
        config: testConfig(),
        version: '1.0.0',
        logger,
        emitter: new MemoryEmitter(),
      })
    ).rejects.toMatchObject({ code: 'MODULE_PARSE_ERROR' });
  });

  it('should report a missing module file as MODULE_PARSE_ERROR', async () => {
    const missing = join(tempDir, 'missing.toml');
    const { logger } = quietLogger();

    try {
      await generateAndWriteAnnotations({
        files: [missing],
        config: testConfig(),
        version: '1.0.0',
        logger,
        emitter: new MemoryEmitter(),
      });
      expect.fail('expected generateAndWriteAnnotations to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(GeneratorError);
      if (error instanceof GeneratorError) {
        expect(error.code).toBe('MODULE_PARSE_ERROR');
        expect(error.message.startsWith(`${missing}: Cannot read module file: ENOENT`)).toBe(true);
      }
    }
  });

  it('should refuse an output folder that holds a module file', async () => {
    const path = await writeModules(COLORS_TOML);
    const config = testConfig();
    config.output.folder = tempDir;
    const { logger } = quietLogger();

    await expect(
      generateAndWriteAnnotations({ files: [path], config, version: '1.0.0', logger })
    ).rejects.toMatchObject({
      code: 'CONFIG_ERROR',
      message: `Output folder '${tempDir}' contains '${path}' and would be deleted`,
    });
    expect(await readFile(path, 'utf-8')).toBe(COLORS_TOML);
  });

  it('should refuse an output folder that holds the working directory', async () => {
    const path = await writeModules(COLORS_TOML);
    const config = testConfig();
    config.output.folder = '..';
    const { logger } = quietLogger();

    await expect(
      generateAndWriteAnnotations({ files: [path], config, version: '1.0.0', logger })
    ).rejects.toMatchObject({
      code: 'CONFIG_ERROR',
      message: `Output folder '..' contains '${process.cwd()}' and would be deleted`,
    });
  });

  it('should report an unknown type in strict mode as UNKNOWN_TYPE', async () => {
    const path = await writeModules(`
[[modules]]
namespace = "sys"

[[modules.elements]]
kind = "function"
name = "sys.open"

[[modules.elements.parameters]]
name = "handle"
types = ["mystery"]
`);
    const { logger } = quietLogger();

    try {
      await generateAndWriteAnnotations({
        files: [path],
        config: testConfig(),
        version: '1.0.0',
        logger,
        strict: true,
        emitter: new MemoryEmitter(),
      });
      expect.fail('expected generateAndWriteAnnotations to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(GeneratorError);
      if (error instanceof GeneratorError) {
        expect(error.code).toBe('UNKNOWN_TYPE');
        expect(error.cause).toBeInstanceOf(UnknownTypeError);
      }
    }
  });

  it('should report an output path outside the folder as FILE_WRITE_ERROR', async () => {
    const path = await writeModules('[[modules]]\nnamespace = "../escape"\n\n[[modules.elements]]\nkind = "variable"\nname = "x"\n');
    const config = testConfig();
    config.output.folder = join(tempDir, 'out');
    const { logger } = quietLogger();

    await expect(
      generateAndWriteAnnotations({ files: [path], config, version: '1.0.0', logger })
    ).rejects.toMatchObject({ code: 'FILE_WRITE_ERROR' });
  });
});
