/**
 * In-page scripts for the place page and parsers for what they return.
 *
 * Scripts are plain expression strings so they can be evaluated through any
 * session backend. Each returns JSON-serializable data; the parsers below turn
 * that `unknown` back into typed values and reject anything malformed as a
 * retryable {@link ExecutionError}.
 */
import type { LabelConfig, SortOrder } from '../../config/src/index.js';
import { ExecutionError } from './errors.js';
import type { RawReview } from './types.js';

export const SELECTORS = {
  loadedMarker: 'div[role="main"] h1, h1.DUwDvf',
  scrollContainer: 'div.m6QErb.DxyBCb',
  reviewNode: 'div.jftiEf[data-review-id], div.jJc9Ad, [data-review-id]',
  author: '.d4r55',
  rating: 'span.kvMYJc, span[role="img"][aria-label]',
  date: 'span.rsqaWe',
  body: 'span.wiI7pd',
  bodyContainer: 'div.MyEned',
  expandButtons: 'button.w8nwRe, button.kyuRq',
  sortMenuItem: 'div[role="menuitemradio"]',
  captcha: 'form#captcha-form, #recaptcha, iframe[src*="recaptcha"]',
} as const;

const EXPANDED_ATTR = 'data-harvest-expanded';

export function buildPlaceUrl(placeId: string, language: string): string {
  return `https://www.google.com/maps/place/?q=place_id:${encodeURIComponent(placeId)}&hl=${encodeURIComponent(language)}`;
}

// Shared helper: finds buttons whose aria-label, data-value or text contains one of the labels.
const FIND_BUTTONS = `
  const findButtons = (labels, root) => {
    const scope = root || document;
    const out = [];
    for (const el of Array.from(scope.querySelectorAll('button, [role="tab"], [role="button"]'))) {
      const texts = [el.getAttribute('aria-label'), el.getAttribute('data-value'), el.textContent]
        .map((t) => String(t || '').trim())
        .filter(Boolean);
      if (labels.some((label) => texts.some((t) => t === label || t.includes(label)))) out.push(el);
    }
    return out;
  };
`;

export function buildPageStateScript(labels: LabelConfig): string {
  return `(() => {
    ${FIND_BUTTONS}
    const href = String(location.href || '');
    const bodyText = String((document.body && document.body.innerText) || '').slice(0, 4000);
    const blocked = href.includes('/sorry/')
      || Boolean(document.querySelector(${JSON.stringify(SELECTORS.captcha)}))
      || /unusual traffic/i.test(bodyText);
    const consent = String(location.hostname || '').startsWith('consent.')
      || findButtons(${JSON.stringify(labels.consentAccept)}).length > 0 && !document.querySelector(${JSON.stringify(SELECTORS.loadedMarker)});
    const loaded = Boolean(document.querySelector(${JSON.stringify(SELECTORS.loadedMarker)}));
    return { url: href, loaded, blocked, consent };
  })()`;
}

export function buildDismissConsentScript(labels: LabelConfig): string {
  return `(() => {
    ${FIND_BUTTONS}
    const [button] = findButtons(${JSON.stringify(labels.consentAccept)});
    if (!button) return false;
    button.click();
    return true;
  })()`;
}

export function buildOpenReviewsTabScript(labels: LabelConfig): string {
  return `(() => {
    ${FIND_BUTTONS}
    const candidates = findButtons(${JSON.stringify(labels.reviewsTab)});
    const tab = candidates.find((el) => el.getAttribute('role') === 'tab') || candidates[0];
    if (!tab) return false;
    tab.click();
    return true;
  })()`;
}

export function buildPanelStateScript(labels: LabelConfig): string {
  return `(() => {
    ${FIND_BUTTONS}
    const container = document.querySelector(${JSON.stringify(SELECTORS.scrollContainer)});
    const nodes = document.querySelectorAll(${JSON.stringify(SELECTORS.reviewNode)}).length;
    const sortButton = findButtons(${JSON.stringify(labels.sortButton)}).length > 0;
    const main = document.querySelector('div[role="main"]');
    const mainText = String((main && main.textContent) || '');
    const zeroReviews = nodes === 0 && ${JSON.stringify(labels.noReviews)}.some((label) => mainText.includes(label));
    return { ready: Boolean(container) && (nodes > 0 || sortButton), zeroReviews };
  })()`;
}

export function buildOpenSortMenuScript(labels: LabelConfig): string {
  return `(() => {
    ${FIND_BUTTONS}
    const [button] = findButtons(${JSON.stringify(labels.sortButton)});
    if (!button) return false;
    button.click();
    return true;
  })()`;
}

export function sortLabels(labels: LabelConfig, order: SortOrder): string[] {
  return order === 'newest' ? labels.sortNewest : labels.sortRelevance;
}

export function buildChooseSortScript(labels: LabelConfig, order: SortOrder): string {
  return `(() => {
    const labels = ${JSON.stringify(sortLabels(labels, order))};
    const items = Array.from(document.querySelectorAll(${JSON.stringify(SELECTORS.sortMenuItem)}));
    const item = items.find((el) => {
      const text = String(el.textContent || el.getAttribute('aria-label') || '').trim();
      return labels.some((label) => text.includes(label));
    });
    if (!item) return false;
    item.click();
    return true;
  })()`;
}

export function buildScrollPanelScript(pages: number): string {
  return `(() => {
    const container = document.querySelector(${JSON.stringify(SELECTORS.scrollContainer)});
    if (!container) return false;
    const step = Math.max(1, container.clientHeight) * ${JSON.stringify(pages)};
    container.scrollTop = Math.min(container.scrollHeight, container.scrollTop + step);
    return true;
  })()`;
}

export function buildExpandReviewsScript(labels: LabelConfig): string {
  return `(() => {
    ${FIND_BUTTONS}
    const labels = ${JSON.stringify([...labels.expandMore, ...labels.showOriginal])};
    const buttons = new Set(Array.from(document.querySelectorAll(${JSON.stringify(SELECTORS.expandButtons)})));
    for (const node of Array.from(document.querySelectorAll(${JSON.stringify(SELECTORS.reviewNode)}))) {
      for (const el of findButtons(labels, node)) buttons.add(el);
    }
    let clicked = 0;
    for (const button of buttons) {
      if (button.getAttribute(${JSON.stringify(EXPANDED_ATTR)})) continue;
      button.setAttribute(${JSON.stringify(EXPANDED_ATTR)}, '1');
      try {
        button.click();
        clicked += 1;
      } catch (_) {
        // button detached by the virtual list between query and click
      }
    }
    return clicked;
  })()`;
}

export function buildReadReviewsScript(): string {
  return `(() => {
    const text = (root, selector) => {
      const el = root.querySelector(selector);
      const value = el ? String(el.textContent || '').trim() : '';
      return value || null;
    };
    const all = Array.from(document.querySelectorAll(${JSON.stringify(SELECTORS.reviewNode)}));
    const nodes = all.filter((node) => !all.some((other) => other !== node && other.contains(node)));
    return nodes.map((node) => {
      const ratingEl = node.querySelector(${JSON.stringify(SELECTORS.rating)});
      const bodyContainer = node.querySelector(${JSON.stringify(SELECTORS.bodyContainer)});
      const pending = Array.from(node.querySelectorAll(${JSON.stringify(SELECTORS.expandButtons)}))
        .some((button) => !button.getAttribute(${JSON.stringify(EXPANDED_ATTR)}));
      return {
        sourceId: node.getAttribute('data-review-id'),
        author: text(node, ${JSON.stringify(SELECTORS.author)}),
        ratingLabel: ratingEl ? ratingEl.getAttribute('aria-label') : null,
        dateText: text(node, ${JSON.stringify(SELECTORS.date)}),
        body: text(node, ${JSON.stringify(SELECTORS.body)}),
        language: bodyContainer ? bodyContainer.getAttribute('lang') : null,
        truncated: pending,
      };
    });
  })()`;
}

export interface PageState {
  url: string;
  loaded: boolean;
  blocked: boolean;
  consent: boolean;
}

export interface PanelState {
  ready: boolean;
  zeroReviews: boolean;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, what: string): UnknownRecord {
  if (!isRecord(value)) {
    throw new ExecutionError(`unexpected ${what} result: ${JSON.stringify(value) ?? String(value)}`);
  }
  return value;
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function parseBoolean(value: unknown, what: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ExecutionError(`unexpected ${what} result: ${String(value)}`);
  }
  return value;
}

export function parseCount(value: unknown, what: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ExecutionError(`unexpected ${what} result: ${String(value)}`);
  }
  return Math.floor(value);
}

export function parsePageState(value: unknown): PageState {
  const rec = expectRecord(value, 'page state');
  return {
    url: optionalString(rec.url) ?? '',
    loaded: rec.loaded === true,
    blocked: rec.blocked === true,
    consent: rec.consent === true,
  };
}

export function parsePanelState(value: unknown): PanelState {
  const rec = expectRecord(value, 'panel state');
  return { ready: rec.ready === true, zeroReviews: rec.zeroReviews === true };
}

export function parseRawReviews(value: unknown): RawReview[] {
  if (!Array.isArray(value)) {
    throw new ExecutionError(`unexpected review read result: ${typeof value}`);
  }
  return value.filter(isRecord).map((rec) => ({
    sourceId: optionalString(rec.sourceId),
    author: optionalString(rec.author),
    ratingLabel: optionalString(rec.ratingLabel),
    dateText: optionalString(rec.dateText),
    body: optionalString(rec.body),
    language: optionalString(rec.language),
    truncated: rec.truncated === true,
  }));
}
