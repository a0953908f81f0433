/**
 * src/extractors/nextPage.ts
 *
 * "Is there another page?" heuristics. The listing's real pagination
 * mechanism is unknown, so detection is a pluggable NextPageDetector and
 * the paginator never depends on one particular rule.
 */

import type { CheerioAPI } from 'cheerio';
import { IndexListingSelectors } from '../config/indexListing.js';

const { pagination: PaginationSelectors } = IndexListingSelectors;

export interface NextPageDetector {
    readonly name: string;
    hasNextPage($: CheerioAPI): boolean;
}

/** Anchor text such as "Next", "next »" or ">". */
export function textSignalDetector(signal: RegExp = PaginationSelectors.textSignal): NextPageDetector {
    return {
        name: `text:${signal.source}`,
        hasNextPage($) {
            return $(PaginationSelectors.anchor)
                .toArray()
                .some((anchor) => signal.test($(anchor).text().trim()));
        },
    };
}

/** `rel="next"` on an anchor or a <link>. */
export function relNextDetector(selector: string = PaginationSelectors.relNext): NextPageDetector {
    return {
        name: 'rel-next',
        hasNextPage($) {
            return $(selector).length > 0;
        },
    };
}

export function anyOf(...detectors: NextPageDetector[]): NextPageDetector {
    return {
        name: detectors.map((d) => d.name).join('|'),
        hasNextPage($) {
            return detectors.some((d) => d.hasNextPage($));
        },
    };
}

export const DEFAULT_NEXT_PAGE_DETECTOR: NextPageDetector = anyOf(textSignalDetector(), relNextDetector());
