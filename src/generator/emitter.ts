/**
 * Destinations for rendered namespaces.
 *
 * @packageDocumentation
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { resolveWithin, safeMkdir, safeRm, safeWriteFile } from '../utils/safe-fs.js';
import type { RenderedNamespace } from './types.js';

/**
 * Receives the units of one run.
 */
export interface Emitter {
  /** Called once before the first unit of a run. */
  prepare(): Promise<void>;
  emit(unit: RenderedNamespace): Promise<void>;
}

/**
 * Options for a FileEmitter.
 */
export interface FileEmitterOptions {
  /** Output directory; removed and recreated by `prepare()`. */
  readonly folder: string;
  /** Extension including the dot. */
  readonly extension: string;
  readonly logger?: Logger;
}

/**
 * Writes each unit to `<folder>/<namespace><extension>`.
 */
export class FileEmitter implements Emitter {
  private readonly folder: string;
  private readonly extension: string;
  private readonly logger: Logger;

  constructor(options: FileEmitterOptions) {
    this.folder = options.folder;
    this.extension = options.extension;
    this.logger = options.logger ?? defaultLogger;
  }

  async prepare(): Promise<void> {
    await safeRm(this.folder, { force: true, recursive: true });
    await safeMkdir(this.folder, { recursive: true });
  }

  /**
   * Writes one unit.
   *
   * @param unit - The rendered namespace.
   * @throws PathValidationError when the namespace would leave the folder.
   */
  async emit(unit: RenderedNamespace): Promise<void> {
    const path = resolveWithin(this.folder, `${unit.namespace}${this.extension}`);
    await safeWriteFile(path, unit.content);
    this.logger.info('namespace_written', { namespace: unit.namespace, path });
  }
}

/**
 * Keeps units in memory, keyed by namespace.
 */
export class MemoryEmitter implements Emitter {
  private readonly store = new Map<string, string>();

  prepare(): Promise<void> {
    this.store.clear();
    return Promise.resolve();
  }

  emit(unit: RenderedNamespace): Promise<void> {
    this.store.set(unit.namespace, unit.content);
    return Promise.resolve();
  }

  /** Namespaces in emit order. */
  get namespaces(): string[] {
    return [...this.store.keys()];
  }

  get(namespace: string): string | undefined {
    return this.store.get(namespace);
  }
}
