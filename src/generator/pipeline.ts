/**
 * Generation pipeline.
 *
 * A run merges the input modules by namespace, registers every constant,
 * infers prefix aliases once, renders every namespace's declarations (which
 * resolves constant references into aliases as it goes) and only then
 * composes each namespace's text, so aliases created while rendering one
 * namespace and the final constant types show up in every unit.
 *
 * @packageDocumentation
 */

import {
  composeBody,
  DeclarationRenderer,
  makeDiagnostics,
  makeHeader,
  makeNamespace,
  NamespaceDeclarations,
  sortElements,
  type RenderedDeclaration,
} from '../annotations/index.js';
import { loadApiModules } from '../api/parser.js';
import {
  ModuleParseError,
  type ApiElement,
  type ApiModule,
  type RenderableElement,
} from '../api/types.js';
import type { Config } from '../config/types.js';
import { assertConfigValid, ConfigValidationError } from '../config/validator.js';
import { createGenerationContext, type GenerationContext } from '../engine/context.js';
import { writeAliasDeclarations, writeConstantFields } from '../engine/declarations.js';
import { compareStrings } from '../engine/names.js';
import { inferConstantAliases } from '../engine/prefix-inference.js';
import { TypeSignatureRenderer, UnknownTypeError } from '../engine/type-renderer.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { containsPath } from '../utils/safe-fs.js';
import { FileEmitter, type Emitter } from './emitter.js';
import { GeneratorError, type GenerateOptions, type RenderedNamespace } from './types.js';

/**
 * Options for a run that reads module files and emits the result.
 */
export interface WriteOptions extends GenerateOptions {
  /** Module descriptor files, TOML or JSON. */
  readonly files: readonly string[];
  /** Destination; defaults to a FileEmitter on `config.output`. */
  readonly emitter?: Emitter;
}

/**
 * A namespace whose declarations have been rendered.
 */
interface RenderedModule {
  readonly module: ApiModule;
  readonly declarations: readonly RenderedDeclaration[];
}

function isRenderable(element: ApiElement): element is RenderableElement {
  return element.kind !== 'unsupported';
}

/**
 * Merges modules sharing a namespace, in first-seen order. A module without
 * a namespace takes the first segment of its first element's name. When a
 * later module's description differs from its brief, it replaces the merged
 * description.
 *
 * @param modules - Modules in input order.
 * @returns Merged modules; the inputs are not modified.
 */
export function mergeModules(modules: readonly ApiModule[]): ApiModule[] {
  const merged = new Map<string, ApiModule>();

  for (const module of modules) {
    let namespace = module.namespace;
    const first = module.elements[0];
    if (namespace === '' && first !== undefined) {
      namespace = /[^.]+/.exec(first.name)?.[0] ?? '';
    }

    const existing = merged.get(namespace);
    if (existing === undefined) {
      merged.set(namespace, { ...module, namespace, elements: [...module.elements] });
      continue;
    }

    merged.set(namespace, {
      ...existing,
      description: module.description !== module.brief ? module.description : existing.description,
      elements: [...existing.elements, ...module.elements],
    });
  }

  return [...merged.values()];
}

/**
 * Composes one namespace's file text.
 */
function composeUnit(
  context: GenerationContext,
  config: Config,
  version: string,
  rendered: RenderedModule
): string {
  const { module, declarations } = rendered;
  const writer = new NamespaceDeclarations();
  writeConstantFields(context, module.namespace, writer);
  writeAliasDeclarations(context, module.namespace, writer);

  const body = composeBody(writer.aliases, declarations);
  const wrapped = module.elements.some((element) => element.name.startsWith(module.namespace));

  const header = makeHeader({
    generatorUrl: config.output.generator_url,
    product: config.output.product,
    version,
    title: module.brief,
    description: module.description,
  });
  const content = wrapped
    ? makeNamespace({
        classPrefix: config.output.class_prefix,
        namespace: module.namespace,
        fields: writer.fields,
        body,
      })
    : body;

  return `${header}\n\n${makeDiagnostics(config.output.disabled_diagnostics)}\n\n${content}\n`;
}

/**
 * Runs one generation in memory.
 *
 * @param modules - Module descriptors in input order.
 * @param options - Configuration, header version and logging.
 * @returns One unit per rendered namespace, sorted by namespace.
 * @throws UnknownTypeError in strict mode.
 *
 * @example
 * ```typescript
 * const units = generateAnnotations(modules, { config: getDefaultConfig(), version: '1.0.0' });
 * for (const unit of units) {
 *   console.log(unit.namespace, unit.content.length);
 * }
 * ```
 */
export function generateAnnotations(
  modules: readonly ApiModule[],
  options: GenerateOptions
): RenderedNamespace[] {
  const { config, version } = options;
  const log = options.logger ?? defaultLogger;
  const strict = options.strict ?? config.generation.strict;

  log.info('generation_started', { modules: modules.length, version, strict });

  const merged = mergeModules(modules).sort((a, b) => compareStrings(a.namespace, b.namespace));
  const context = createGenerationContext();

  for (const module of merged) {
    for (const element of module.elements) {
      if (element.kind === 'constant') {
        context.catalog.registerElement(element.name, element.description ?? '');
      }
    }
  }

  inferConstantAliases(context, log);

  const declarationRenderer = new DeclarationRenderer(
    new TypeSignatureRenderer(context, { config, strict, logger: log }),
    config
  );

  const rendered: RenderedModule[] = [];
  for (const module of merged) {
    const elements = module.elements.filter(isRenderable);
    if (elements.length === 0) {
      log.info('module_skipped', { namespace: module.namespace, reason: 'no_renderable_elements' });
      continue;
    }

    const declarations: RenderedDeclaration[] = [];
    for (const element of sortElements(elements)) {
      const text = declarationRenderer.renderElement(element);
      if (text !== undefined) {
        declarations.push({ kind: element.kind, text });
      }
    }
    rendered.push({ module, declarations });
  }

  const units = rendered.map((entry) => ({
    namespace: entry.module.namespace,
    content: composeUnit(context, config, version, entry),
  }));

  log.info('generation_completed', {
    namespaces: units.length,
    constants: context.catalog.size,
    aliases: context.aliases.all().length,
  });

  return units;
}

/**
 * Rejects an output folder whose removal would take the working directory or
 * an input file with it. The file emitter deletes the folder before writing.
 *
 * @param folder - The configured output folder.
 * @param files - The module files of the run.
 * @throws GeneratorError with code CONFIG_ERROR.
 */
function assertOutputFolderSafe(folder: string, files: readonly string[]): void {
  for (const target of [process.cwd(), ...files]) {
    if (containsPath(folder, target)) {
      throw new GeneratorError(
        `Output folder '${folder}' contains '${target}' and would be deleted`,
        'CONFIG_ERROR'
      );
    }
  }
}

/**
 * Reads module files, generates and emits every namespace.
 *
 * @param options - Files, configuration and destination.
 * @returns The emitted units.
 * @throws GeneratorError with the code of the failing stage.
 */
export async function generateAndWriteAnnotations(
  options: WriteOptions
): Promise<RenderedNamespace[]> {
  const log = options.logger ?? defaultLogger;

  try {
    assertConfigValid(options.config);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      throw new GeneratorError(error.message, 'CONFIG_ERROR', error);
    }
    throw error;
  }

  assertOutputFolderSafe(options.config.output.folder, options.files);

  let modules: ApiModule[];
  try {
    modules = await loadApiModules(options.files);
  } catch (error) {
    if (error instanceof ModuleParseError) {
      throw new GeneratorError(error.message, 'MODULE_PARSE_ERROR', error);
    }
    throw error;
  }

  let units: RenderedNamespace[];
  try {
    units = generateAnnotations(modules, options);
  } catch (error) {
    if (error instanceof UnknownTypeError) {
      throw new GeneratorError(error.message, 'UNKNOWN_TYPE', error);
    }
    throw error;
  }

  const emitter =
    options.emitter ??
    new FileEmitter({
      folder: options.config.output.folder,
      extension: options.config.output.extension,
      logger: log,
    });

  try {
    await emitter.prepare();
    for (const unit of units) {
      await emitter.emit(unit);
    }
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new GeneratorError(`Failed to write annotations: ${cause.message}`, 'FILE_WRITE_ERROR', cause);
  }

  return units;
}
