import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import { logDebug } from '../../logging/src/index.js';
import type { BrowserBackend, BrowserBackendOptions, GotoResult } from './BrowserBackend.js';

export const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
];

const BLOCKED_RESOURCE_TYPES = new Set(['image', 'font', 'media']);

export class BrowserSession implements BrowserBackend {
  private browser?: Browser;
  private context?: BrowserContext;
  private page?: Page;
  private exited = false;

  onExit?: (sessionId: string) => void;

  constructor(private options: BrowserBackendOptions) {}

  get id(): string {
    return this.options.sessionId;
  }

  async start(): Promise<void> {
    const { headless, language, userAgent, viewport, blockResources } = this.options;
    this.browser = await chromium.launch({
      headless,
      args: [...LAUNCH_ARGS, `--lang=${language}`],
    });
    this.browser.on('disconnected', () => this.notifyExit());

    this.context = await this.browser.newContext({ userAgent, viewport, locale: language });
    if (blockResources) {
      await this.context.route('**/*', (route) =>
        BLOCKED_RESOURCE_TYPES.has(route.request().resourceType()) ? route.abort() : route.continue(),
      );
    }

    const page = await this.context.newPage();
    page.on('crash', () => this.notifyExit());
    page.on('close', () => this.notifyExit());
    this.page = page;

    logDebug('session', 'browser:started', { sessionId: this.id, headless, language, blockResources });
  }

  async goto(url: string, timeoutMs: number): Promise<GotoResult> {
    const page = this.requirePage();
    const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    return { status: response ? response.status() : null, url: page.url() };
  }

  async evaluate(script: string): Promise<unknown> {
    return this.requirePage().evaluate<unknown>(script);
  }

  isAlive(): boolean {
    if (this.exited || !this.page || this.page.isClosed()) return false;
    return Boolean(this.browser?.isConnected());
  }

  async close(): Promise<void> {
    try {
      await this.context?.close();
    } finally {
      await this.browser?.close();
      this.notifyExit();
    }
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error(`session ${this.id} has not been started`);
    }
    return this.page;
  }

  private notifyExit() {
    if (this.exited) return;
    this.exited = true;
    logDebug('session', 'browser:exit', { sessionId: this.id });
    this.onExit?.(this.id);
  }
}
