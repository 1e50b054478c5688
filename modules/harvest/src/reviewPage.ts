import type { LabelConfig, SortOrder } from '../../config/src/index.js';
import type { SessionHandle, SessionManager } from '../../session-manager/src/index.js';
import {
  buildChooseSortScript,
  buildDismissConsentScript,
  buildExpandReviewsScript,
  buildOpenReviewsTabScript,
  buildOpenSortMenuScript,
  buildPageStateScript,
  buildPanelStateScript,
  buildReadReviewsScript,
  buildScrollPanelScript,
  parseBoolean,
  parseCount,
  parsePageState,
  parsePanelState,
  parseRawReviews,
  type PageState,
  type PanelState,
} from './reviewDom.js';
import { ElementNotFoundError } from './errors.js';
import type { RawReview } from './types.js';

/**
 * The page operations the driver needs. Each call is one round trip to the
 * browser; waiting and retrying belong to the caller.
 */
export interface ReviewPage {
  navigate(url: string): Promise<void>;
  readPageState(): Promise<PageState>;
  dismissConsent(): Promise<boolean>;
  /** Clicks the reviews tab; false when the page has none. */
  openReviewsTab(): Promise<boolean>;
  readPanelState(): Promise<PanelState>;
  openSortMenu(): Promise<boolean>;
  chooseSortOrder(order: SortOrder): Promise<boolean>;
  scrollReviews(pages: number): Promise<void>;
  /** Triggers every pending "More" / "See original" control; resolves with the number clicked. */
  expandLoadedReviews(): Promise<number>;
  readLoadedReviews(): Promise<RawReview[]>;
}

export type ReviewPageFactory = (sessions: SessionManager, handle: SessionHandle) => ReviewPage;

export class DomReviewPage implements ReviewPage {
  constructor(
    private sessions: SessionManager,
    private handle: SessionHandle,
    private labels: LabelConfig,
  ) {}

  async navigate(url: string): Promise<void> {
    await this.sessions.navigate(this.handle, url);
  }

  async readPageState(): Promise<PageState> {
    return parsePageState(await this.run(buildPageStateScript(this.labels)));
  }

  async dismissConsent(): Promise<boolean> {
    return parseBoolean(await this.run(buildDismissConsentScript(this.labels)), 'consent');
  }

  async openReviewsTab(): Promise<boolean> {
    return parseBoolean(await this.run(buildOpenReviewsTabScript(this.labels)), 'reviews tab');
  }

  async readPanelState(): Promise<PanelState> {
    return parsePanelState(await this.run(buildPanelStateScript(this.labels)));
  }

  async openSortMenu(): Promise<boolean> {
    return parseBoolean(await this.run(buildOpenSortMenuScript(this.labels)), 'sort menu');
  }

  async chooseSortOrder(order: SortOrder): Promise<boolean> {
    return parseBoolean(await this.run(buildChooseSortScript(this.labels, order)), 'sort option');
  }

  async scrollReviews(pages: number): Promise<void> {
    const scrolled = parseBoolean(await this.run(buildScrollPanelScript(pages)), 'scroll');
    if (!scrolled) {
      throw new ElementNotFoundError('review scroll container');
    }
  }

  async expandLoadedReviews(): Promise<number> {
    return parseCount(await this.run(buildExpandReviewsScript(this.labels)), 'expand');
  }

  async readLoadedReviews(): Promise<RawReview[]> {
    return parseRawReviews(await this.run(buildReadReviewsScript()));
  }

  private run(script: string): Promise<unknown> {
    return this.sessions.evaluate(this.handle, script);
  }
}

export function domReviewPageFactory(labels: LabelConfig): ReviewPageFactory {
  return (sessions, handle) => new DomReviewPage(sessions, handle, labels);
}
