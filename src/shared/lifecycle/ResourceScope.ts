import type { Logger } from "../logging/logger";

export type ReleaseFn = () => Promise<void> | void;

export type ResourceHandle = {
  readonly name: string;
  /** Releases this resource now instead of at scope close. Runs at most once. */
  release(): Promise<void>;
};

export type SignalSource = {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
};

export type InterruptHandlers = {
  /** First signal. The owner stops scheduling work and lets the scope close on its own. */
  onInterrupt?: (signal: NodeJS.Signals) => void;
  /** Any later signal, after the scope has been closed without waiting for the owner. */
  onForceClose?: (signal: NodeJS.Signals) => void;
};

type Entry = {
  name: string;
  release: ReleaseFn;
  released: boolean;
};

/**
 * Cleanup coordinator. Resources registered here are released exactly once, in
 * reverse registration order, whichever way the owning scope exits. Release
 * failures are logged and never raised.
 */
export class ResourceScope {
  private readonly entries: Entry[] = [];
  private closing?: Promise<void>;

  constructor(private readonly logger: Logger) {}

  static async use<T>(logger: Logger, fn: (scope: ResourceScope) => Promise<T>): Promise<T> {
    return new ResourceScope(logger).use(fn);
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  register(name: string, release: ReleaseFn): ResourceHandle {
    const entry: Entry = { name, release, released: false };
    this.entries.push(entry);

    if (this.closing) {
      // Late registration after close: nothing else will release it.
      this.logger.warn("resource.registered_after_close", { resource: name });
      void this.releaseEntry(entry);
    }

    return {
      name,
      release: () => this.releaseEntry(entry)
    };
  }

  async use<T>(fn: (scope: ResourceScope) => Promise<T>): Promise<T> {
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.releaseAll();
    }
    return this.closing;
  }

  /**
   * The first SIGINT/SIGTERM is only reported to `onInterrupt`; a second one closes
   * the scope immediately. Returns a function that removes the listeners again.
   */
  bindProcessSignals(
    source: SignalSource,
    handlers: InterruptHandlers = {},
    signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"]
  ): () => void {
    let interrupts = 0;
    const listeners = signals.map((signal) => {
      const listener = () => {
        interrupts += 1;
        if (interrupts === 1) {
          this.logger.warn("process.interrupted", { signal });
          handlers.onInterrupt?.(signal);
          return;
        }
        this.logger.warn("process.force_close", { signal });
        void this.close().then(() => handlers.onForceClose?.(signal));
      };
      source.on(signal, listener);
      return { signal, listener };
    });

    return () => {
      for (const { signal, listener } of listeners) {
        source.removeListener(signal, listener);
      }
    };
  }

  private async releaseAll(): Promise<void> {
    for (let index = this.entries.length - 1; index >= 0; index -= 1) {
      const entry = this.entries[index];
      if (entry) await this.releaseEntry(entry);
    }
  }

  private async releaseEntry(entry: Entry): Promise<void> {
    if (entry.released) return;
    entry.released = true;
    try {
      await entry.release();
      this.logger.debug("resource.released", { resource: entry.name });
    } catch (err) {
      this.logger.error("resource.release_failed", { resource: entry.name, error: err });
    }
  }
}
