/**
 * Worker registry
 * In-process WorkerResolver backed by per-kind factories
 */

import { createSubsystemLogger } from "../logger.js";
import type { Worker, WorkerResolver } from "./types.js";

export type WorkerFactory = () => Worker | Promise<Worker>;

const log = createSubsystemLogger("teams").child("workers");

export class WorkerRegistry implements WorkerResolver {
  private factories = new Map<string, WorkerFactory>();

  /**
   * Register a factory for a worker kind. Returns a function that removes it again.
   */
  register(workerKind: string, factory: WorkerFactory): () => void {
    if (this.factories.has(workerKind)) {
      log.warn(`replacing worker factory for "${workerKind}"`);
    }
    this.factories.set(workerKind, factory);
    return () => {
      if (this.factories.get(workerKind) === factory) {
        this.factories.delete(workerKind);
      }
    };
  }

  /**
   * Register an already-built worker instance.
   */
  registerInstance(workerKind: string, worker: Worker): () => void {
    return this.register(workerKind, () => worker);
  }

  has(workerKind: string): boolean {
    return this.factories.has(workerKind);
  }

  kinds(): string[] {
    return [...this.factories.keys()];
  }

  async resolve(workerKind: string): Promise<Worker | undefined> {
    const factory = this.factories.get(workerKind);
    if (!factory) {
      log.debug(`unknown worker kind "${workerKind}"`);
      return undefined;
    }
    return factory();
  }
}
