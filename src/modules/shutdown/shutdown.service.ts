import { Logger } from '../../common/logger.js';
import { SHUTDOWN_TIMEOUT_MS } from '../../common/constants/app.constants.js';
import { ErrorExtractor } from '../../common/utils/error-extractor.util.js';

type ShutdownHook = () => Promise<void> | void;

/**
 * Service for managing graceful shutdown.
 * Exposes an AbortSignal that fires when shutdown starts and runs
 * cleanup hooks (most recently registered first) within a time limit.
 */
export class ShutdownService {
  private readonly logger = new Logger(ShutdownService.name);
  private readonly abortController = new AbortController();
  private readonly hooks: Array<{ name: string; hook: ShutdownHook }> = [];
  private readonly timeoutMs: number;
  private readonly exit: (code: number) => void;
  private shutdownPromise: Promise<boolean> | null = null;

  constructor(params?: { timeoutMs?: number; exit?: (code: number) => void }) {
    this.timeoutMs = params?.timeoutMs ?? SHUTDOWN_TIMEOUT_MS;
    this.exit = params?.exit ?? (code => process.exit(code));
  }

  /**
   * Check if the service is currently shutting down
   */
  public get shuttingDown(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Signal aborted as soon as shutdown starts
   */
  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /**
   * Register a cleanup hook
   */
  public onShutdown(name: string, hook: ShutdownHook): void {
    this.hooks.push({ name, hook });
  }

  /**
   * Start shutdown. Calling it again returns the shutdown already in progress.
   * @returns false when the hooks did not finish within the timeout
   */
  public shutdown(reason?: string): Promise<boolean> {
    if (!this.shutdownPromise) {
      this.logger.log(`Shutdown signal received: ${reason ?? 'unknown'}`);
      this.abortController.abort();
      this.shutdownPromise = this.runHooks();
    }
    return this.shutdownPromise;
  }

  /**
   * Shut down and exit on process signals: code 0 once the hooks are done,
   * 1 when they hit the timeout.
   * @returns function removing the listeners
   */
  public listen(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): () => void {
    const handler = (signal: NodeJS.Signals): void => {
      void this.shutdown(signal).then(completed => {
        this.exit(completed ? 0 : 1);
      });
    };
    for (const signal of signals) {
      process.on(signal, handler);
    }
    return () => {
      for (const signal of signals) {
        process.off(signal, handler);
      }
    };
  }

  private async runHooks(): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.timeoutMs);
    });

    const hooks = async (): Promise<'done'> => {
      for (const { name, hook } of [...this.hooks].reverse()) {
        try {
          await hook();
          this.logger.debug(`Shutdown hook "${name}" completed`);
        } catch (error) {
          this.logger.error(
            `Shutdown hook "${name}" failed: ${ErrorExtractor.extractErrorMessage(error)}`,
            error,
          );
        }
      }
      return 'done';
    };

    const result = await Promise.race([hooks(), timeout]);
    clearTimeout(timer);

    if (result === 'timeout') {
      this.logger.warn(`Shutdown timeout reached after ${this.timeoutMs}ms, exiting anyway`);
      return false;
    }

    this.logger.log('Graceful shutdown complete');
    return true;
  }
}
