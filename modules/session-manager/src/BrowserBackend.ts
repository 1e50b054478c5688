export interface BrowserLaunchOptions {
  headless: boolean;
  language: string;
  userAgent: string;
  viewport: { width: number; height: number };
  blockResources: boolean;
}

export interface BrowserBackendOptions extends BrowserLaunchOptions {
  sessionId: string;
}

export interface GotoResult {
  /** HTTP status of the main document, null when the navigation produced no response. */
  status: number | null;
  url: string;
}

/**
 * One exclusively owned browser process with a single page.
 */
export interface BrowserBackend {
  readonly id: string;
  onExit?: (sessionId: string) => void;
  start(): Promise<void>;
  goto(url: string, timeoutMs: number): Promise<GotoResult>;
  /** Evaluates a script expression in the page and resolves with its (awaited) value. */
  evaluate(script: string): Promise<unknown>;
  isAlive(): boolean;
  close(): Promise<void>;
}

export type BackendFactory = (options: BrowserBackendOptions) => BrowserBackend;
