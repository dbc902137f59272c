/**
 * Pairs acquisition with a release that runs exactly once.
 *
 * Acquired resources are released in reverse order. Every release is
 * attempted even when an earlier one fails; failures are collected and
 * reported to the diagnostic sink, never thrown over a primary error.
 */
import type { DiagnosticSink } from "../logger.js";
import { asError, tetherError, withSuppressed } from "../errors.js";

/** Anything with a single asynchronous release. */
export interface Releasable {
  dispose(): Promise<void>;
}

export interface Acquirer<T = unknown> {
  name: string;
  acquire(): Promise<T>;
  release(value: T): Promise<void>;
}

export interface ResourceGuardOptions {
  logger?: DiagnosticSink;
  label?: string;
}

interface Held {
  name: string;
  release: () => Promise<void>;
}

/** Build an acquirer for something that is already Releasable. */
export function releasable<T extends Releasable>(name: string, acquire: () => Promise<T>): Acquirer<T> {
  return { name, acquire, release: (value) => value.dispose() };
}

export class ResourceGuard implements Releasable {
  private readonly held: Held[] = [];
  private released: Promise<Error[]> | null = null;

  constructor(private readonly options: ResourceGuardOptions = {}) {}

  /**
   * Acquire every resource concurrently and wait for all of them to settle.
   * If any acquisition fails, the ones that succeeded are released before
   * the first failure is rethrown, carrying release failures as `suppressed`.
   */
  static async open(acquirers: Acquirer[], options: ResourceGuardOptions = {}): Promise<ResourceGuard> {
    const guard = new ResourceGuard(options);
    await guard.acquireAll(acquirers);
    return guard;
  }

  get isReleased(): boolean {
    return this.released !== null;
  }

  get size(): number {
    return this.held.length;
  }

  async acquire<T>(name: string, acquire: () => Promise<T>, release: (value: T) => Promise<void>): Promise<T> {
    if (this.released) {
      throw tetherError("invalid_state", `Cannot acquire "${name}": guard already released`);
    }
    const value = await acquire();
    this.held.push({ name, release: () => release(value) });
    return value;
  }

  async acquireAll(acquirers: Acquirer[]): Promise<unknown[]> {
    if (this.released) {
      throw tetherError("invalid_state", "Cannot acquire: guard already released");
    }
    const settled = await Promise.allSettled(acquirers.map((a) => Promise.resolve().then(() => a.acquire())));
    const values: unknown[] = [];
    let primary: unknown;
    let failed = false;
    settled.forEach((result, i) => {
      const acquirer = acquirers[i];
      if (result.status === "fulfilled") {
        this.held.push({ name: acquirer.name, release: () => acquirer.release(result.value) });
        values.push(result.value);
      } else if (!failed) {
        failed = true;
        primary = result.reason;
      } else {
        this.options.logger?.warn(`${this.prefix()}"${acquirer.name}" also failed to acquire: ${asError(result.reason).message}`);
      }
    });
    if (failed) {
      const cleanup = await this.release();
      throw withSuppressed(primary, cleanup);
    }
    return values;
  }

  /**
   * Release everything held, last acquired first. Runs once; later calls
   * return the same result. Resolves with the release failures.
   */
  release(): Promise<Error[]> {
    if (!this.released) this.released = this.releaseHeld();
    return this.released;
  }

  async dispose(): Promise<void> {
    await this.release();
  }

  /**
   * Run `body`, then release. An error from `body` wins; release failures
   * ride along on it as `suppressed`.
   */
  async use<T>(body: (guard: ResourceGuard) => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await body(this);
    } catch (e: unknown) {
      const cleanup = await this.release();
      throw withSuppressed(e, cleanup);
    }
    await this.release();
    return result;
  }

  private async releaseHeld(): Promise<Error[]> {
    const failures: Error[] = [];
    while (this.held.length > 0) {
      const item = this.held.pop();
      if (!item) break;
      try {
        await item.release();
      } catch (e: unknown) {
        const err = tetherError("disposal_error", `Failed to release "${item.name}": ${asError(e).message}`, { cause: e });
        failures.push(err);
        this.options.logger?.error(`${this.prefix()}${err.message}`);
      }
    }
    return failures;
  }

  private prefix(): string {
    return this.options.label ? `[${this.options.label}] ` : "";
  }
}
