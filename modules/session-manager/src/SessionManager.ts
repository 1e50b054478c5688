import { createLogger, type Logger } from '../../logging/src/index.js';
import {
  ExecutionError,
  NavigationError,
  SessionCrashError,
  errorMessage,
  isClosedTargetMessage,
  isTimeoutMessage,
} from '../../harvest/src/errors.js';
import { BrowserSession } from './BrowserSession.js';
import type { BackendFactory, BrowserBackend, BrowserLaunchOptions } from './BrowserBackend.js';

export interface SessionHandle {
  readonly id: string;
  readonly workerId: string;
  readonly openedAt: number;
}

export interface SessionManagerOptions {
  workerId: string;
  browser: BrowserLaunchOptions;
  navigationTimeoutMs: number;
  logger?: Logger;
}

/**
 * Owns the browser sessions of one worker. Each handle maps to its own
 * browser process; handles are never shared between workers.
 */
export class SessionManager {
  private sessions = new Map<string, BrowserBackend>();
  /** Sessions whose browser reported an exit; kept until released so the process still gets closed. */
  private exited = new Set<string>();
  private opened = 0;
  private backendFactory: BackendFactory;
  private logger: Logger;

  constructor(
    private options: SessionManagerOptions,
    backendFactory?: BackendFactory,
  ) {
    this.backendFactory = backendFactory || ((opts) => new BrowserSession(opts));
    this.logger = options.logger ?? createLogger(`session:${options.workerId}`);
  }

  get activeCount(): number {
    return this.sessions.size;
  }

  async open(): Promise<SessionHandle> {
    this.opened += 1;
    const id = `${this.options.workerId}-s${this.opened}`;
    const backend = this.backendFactory({ ...this.options.browser, sessionId: id });
    backend.onExit = (sessionId) => {
      if (this.sessions.get(sessionId) === backend) {
        this.exited.add(sessionId);
        this.logger.warn(`session ${sessionId} exited`);
      }
    };

    try {
      await backend.start();
    } catch (err) {
      await backend.close().catch((closeErr: unknown) => {
        this.logger.warn(`close after failed start of ${id} failed: ${errorMessage(closeErr)}`);
      });
      throw new SessionCrashError(`session ${id} failed to start: ${errorMessage(err)}`, { cause: err });
    }

    this.sessions.set(id, backend);
    this.logger.debug('session:open', { sessionId: id });
    return { id, workerId: this.options.workerId, openedAt: Date.now() };
  }

  async navigate(handle: SessionHandle, url: string): Promise<void> {
    const backend = this.requireLive(handle);
    let status: number | null;
    try {
      ({ status } = await backend.goto(url, this.options.navigationTimeoutMs));
    } catch (err) {
      const message = errorMessage(err);
      if (!this.isAlive(handle) || isClosedTargetMessage(message)) {
        throw new SessionCrashError(`session ${handle.id} died during navigation: ${message}`, { cause: err });
      }
      if (isTimeoutMessage(message)) {
        throw new NavigationError('timeout', `navigation to ${url} timed out: ${message}`, { cause: err });
      }
      throw new NavigationError('network', `navigation to ${url} failed: ${message}`, { cause: err });
    }
    if (status !== null && (status < 200 || status >= 400)) {
      throw new NavigationError('http', `navigation to ${url} returned HTTP ${status}`, { status });
    }
  }

  async evaluate(handle: SessionHandle, script: string): Promise<unknown> {
    const backend = this.requireLive(handle);
    try {
      return await backend.evaluate(script);
    } catch (err) {
      const message = errorMessage(err);
      if (!this.isAlive(handle) || isClosedTargetMessage(message)) {
        throw new SessionCrashError(`session ${handle.id} died during evaluate: ${message}`, { cause: err });
      }
      throw new ExecutionError(`in-page script failed: ${message}`, { cause: err });
    }
  }

  isAlive(handle: SessionHandle): boolean {
    if (this.exited.has(handle.id)) return false;
    return this.sessions.get(handle.id)?.isAlive() ?? false;
  }

  async release(handle: SessionHandle): Promise<void> {
    const backend = this.sessions.get(handle.id);
    if (!backend) return;
    this.sessions.delete(handle.id);
    this.exited.delete(handle.id);
    try {
      await backend.close();
    } catch (err) {
      // A crashed browser often refuses to close cleanly; the handle is gone either way.
      this.logger.warn(`release ${handle.id} failed: ${errorMessage(err)}`);
    }
    this.logger.debug('session:release', { sessionId: handle.id });
  }

  /** Opens a session for the duration of `fn` and releases it on every exit path. */
  async withSession<T>(fn: (handle: SessionHandle) => Promise<T>): Promise<T> {
    const handle = await this.open();
    try {
      return await fn(handle);
    } finally {
      await this.release(handle);
    }
  }

  async shutdown(): Promise<void> {
    const ids = Array.from(this.sessions.keys());
    for (const id of ids) {
      await this.release({ id, workerId: this.options.workerId, openedAt: 0 });
    }
  }

  private requireLive(handle: SessionHandle): BrowserBackend {
    const backend = this.sessions.get(handle.id);
    if (!backend) {
      throw new SessionCrashError(`session ${handle.id} is not open`);
    }
    if (this.exited.has(handle.id) || !backend.isAlive()) {
      throw new SessionCrashError(`session ${handle.id} is no longer alive`);
    }
    return backend;
  }
}
