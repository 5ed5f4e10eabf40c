import { mapBlockInlines, type DocumentTree, type Inline } from '../models/document.js';
import { DEFAULT_TRACKING_WRAPPERS, type TrackingWrapper } from '../models/options.js';
import { logger } from '../util/logger.js';

export interface LinkRewriteResult {
  document: DocumentTree;
  rewritten: number;
}

/**
 * Replaces tracking-redirect hrefs with the destination they wrap.
 */
export class LinkRewriter {
  private readonly wrappers: TrackingWrapper[];

  constructor(wrappers: readonly TrackingWrapper[] = DEFAULT_TRACKING_WRAPPERS) {
    this.wrappers = wrappers.map(wrapper => ({ ...wrapper, hostname: wrapper.hostname.toLowerCase() }));
  }

  rewrite(document: DocumentTree): LinkRewriteResult {
    let rewritten = 0;

    const rewriteInlines = (inlines: readonly Inline[]): readonly Inline[] =>
      inlines.map(inline => {
        if (inline.kind !== 'link') return inline;
        const href = this.resolveHref(inline.href);
        if (href === inline.href) return inline;
        rewritten++;
        return { ...inline, href };
      });

    const blocks = document.blocks.map(block => mapBlockInlines(block, rewriteInlines));

    logger.debug('Rewrote tracking links', { rewritten });
    return { document: { blocks }, rewritten };
  }

  /**
   * The real destination behind `href`, or `href` itself when it is not a
   * tracking wrapper or the wrapped target cannot be decoded.
   */
  resolveHref(href: string): string {
    let url: URL;
    try {
      url = new URL(href);
    } catch {
      return href;
    }

    const wrapper = this.wrappers.find(
      candidate => candidate.hostname === url.hostname && candidate.pathname === url.pathname
    );
    if (!wrapper) return href;

    const target = url.searchParams.get(wrapper.param);
    if (!target || !isAbsoluteUrl(target)) {
      logger.debug('Tracking link has no decodable target', { href });
      return href;
    }

    return target;
  }
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}
