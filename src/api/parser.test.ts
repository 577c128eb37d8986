import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  formatFromPath,
  loadApiModules,
  ModuleParseError,
  parseApiModules,
} from './index.js';

const GUI_TOML = `
[[modules]]
namespace = "gui"
brief = "GUI API"
description = "Functions for <b>GUI</b> nodes"

[[modules.elements]]
kind = "constant"
name = "gui.PROP_POSITION"
description = "position property"

[[modules.elements]]
kind = "function"
name = "gui.animate"
description = "animates a node"

[[modules.elements.parameters]]
name = "node"
doc = "node to animate"
types = ["node"]

[[modules.elements.parameters]]
name = "property"
types = ["string", "constant"]
optional = true

[[modules.elements.returns]]
name = "ok"
types = ["boolean"]

[[modules.elements]]
kind = "message"
name = "gui.layout_changed"
`;

describe('parseApiModules', () => {
  describe('TOML documents', () => {
    it('should parse modules with their elements in order', () => {
      const modules = parseApiModules(GUI_TOML, 'toml');

      expect(modules).toHaveLength(1);
      const gui = modules[0];
      expect(gui?.namespace).toBe('gui');
      expect(gui?.brief).toBe('GUI API');
      expect(gui?.description).toBe('Functions for <b>GUI</b> nodes');
      expect(gui?.elements.map((e) => e.kind)).toEqual(['constant', 'function', 'unsupported']);
    });

    it('should parse function parameters and returns', () => {
      const modules = parseApiModules(GUI_TOML, 'toml');
      const animate = modules[0]?.elements[1];

      if (animate?.kind !== 'function') {
        throw new Error('expected gui.animate to be a function');
      }
      expect(animate.parameters).toEqual([
        { name: 'node', doc: 'node to animate', types: ['node'] },
        { name: 'property', types: ['string', 'constant'], optional: true },
      ]);
      expect(animate.returns).toEqual([{ name: 'ok', types: ['boolean'] }]);
    });

    it('should keep unknown kinds as unsupported elements', () => {
      const modules = parseApiModules(GUI_TOML, 'toml');

      expect(modules[0]?.elements[2]).toEqual({
        kind: 'unsupported',
        name: 'gui.layout_changed',
        sourceKind: 'message',
      });
    });

    it('should default missing module fields to empty strings', () => {
      const modules = parseApiModules('[[modules]]\n', 'toml');

      expect(modules).toEqual([{ namespace: '', brief: '', description: '', elements: [] }]);
    });

    it('should return no modules for an empty document', () => {
      expect(parseApiModules('', 'toml')).toEqual([]);
    });
  });

  describe('JSON documents', () => {
    it('should parse classes with fields and operators', () => {
      const json = JSON.stringify({
        modules: [
          {
            namespace: 'vmath',
            elements: [
              {
                kind: 'class',
                name: 'vector3',
                fields: { x: 'number', y: 'number' },
                global: true,
                operators: { add: { param: 'vector3', result: 'vector3' }, unm: { result: 'vector3' } },
              },
              { kind: 'alias', name: 'hash', definition: 'userdata' },
            ],
          },
        ],
      });

      const [vmath] = parseApiModules(json, 'json');

      expect(vmath?.elements[0]).toEqual({
        kind: 'class',
        name: 'vector3',
        fields: { x: 'number', y: 'number' },
        global: true,
        operators: { add: { param: 'vector3', result: 'vector3' }, unm: { result: 'vector3' } },
      });
      expect(vmath?.elements[1]).toEqual({ kind: 'alias', name: 'hash', definition: 'userdata' });
    });

    it('should default class global to false', () => {
      const json = '{"modules":[{"elements":[{"kind":"class","name":"url"}]}]}';
      const [module] = parseApiModules(json, 'json');

      expect(module?.elements[0]).toMatchObject({ kind: 'class', global: false });
    });
  });

  describe('invalid documents', () => {
    it('should throw ModuleParseError for invalid JSON syntax', () => {
      expect(() => parseApiModules('{ modules: ', 'json')).toThrow(ModuleParseError);
      expect(() => parseApiModules('{ modules: ', 'json')).toThrow('Invalid JSON syntax');
    });

    it('should keep the syntax error as cause', () => {
      try {
        parseApiModules('[[modules', 'toml');
        expect.fail('expected parseApiModules to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ModuleParseError);
        if (error instanceof ModuleParseError) {
          expect(error.cause).toBeInstanceOf(Error);
        }
      }
    });

    it('should reject a root that is not an object', () => {
      expect(() => parseApiModules('[1, 2]', 'json')).toThrow(
        "Invalid type for '<root>': expected table, got array"
      );
    });

    it('should reject an element without a name', () => {
      const json = '{"modules":[{"elements":[{"kind":"constant"}]}]}';

      expect(() => parseApiModules(json, 'json')).toThrow(
        "Invalid type for 'modules[0].elements[0].name': expected string, got undefined"
      );
    });

    it('should reject non-string type tokens', () => {
      const json =
        '{"modules":[{"elements":[{"kind":"function","name":"f","parameters":[{"name":"a","types":["x",2]}]}]}]}';

      expect(() => parseApiModules(json, 'json')).toThrow(
        "Invalid type for 'modules[0].elements[0].parameters[0].types[1]': expected string, got number"
      );
    });

    it('should reject prohibited keys in class fields', () => {
      const json =
        '{"modules":[{"elements":[{"kind":"class","name":"c","fields":{"constructor":"number"}}]}]}';

      expect(() => parseApiModules(json, 'json')).toThrow(
        "Prohibited key 'constructor' found at 'modules[0].elements[0].fields'"
      );
    });
  });
});

describe('formatFromPath', () => {
  it('should choose the format from the extension', () => {
    expect(formatFromPath('modules/gui.toml')).toBe('toml');
    expect(formatFromPath('modules/GUI.JSON')).toBe('json');
  });

  it('should reject other extensions', () => {
    expect(() => formatFromPath('modules/gui.yaml')).toThrow(
      "Unsupported module file extension '.yaml': expected .toml or .json"
    );
  });
});

describe('loadApiModules', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'api-modules-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should read files in order and concatenate their modules', async () => {
    const tomlPath = join(tempDir, 'gui.toml');
    const jsonPath = join(tempDir, 'go.json');
    await writeFile(tomlPath, GUI_TOML, 'utf-8');
    await writeFile(jsonPath, '{"modules":[{"namespace":"go"}]}', 'utf-8');

    const modules = await loadApiModules([tomlPath, jsonPath]);

    expect(modules.map((m) => m.namespace)).toEqual(['gui', 'go']);
  });

  it('should name the failing file', async () => {
    const badPath = join(tempDir, 'bad.json');
    await writeFile(badPath, '{"modules":{}}', 'utf-8');

    await expect(loadApiModules([badPath])).rejects.toThrow(
      `${badPath}: Invalid type for 'modules': expected array, got object`
    );
  });
});
