/**
 * src/config/indexListing.ts
 *
 * Selector map for the daily index listing.
 *
 * ABOUT THE LISTING STRUCTURE
 * ───────────────────────────
 * The listing is a server-rendered table, one row per trading day:
 *   [#, Date (YYYY/MM/DD), Index Value, Change, % Change]
 * The markup around it is not stable, so rows are located through a
 * cascade of progressively looser selectors. The first one that yields more
 * than `minRows` data rows wins.
 */

export const IndexListingSelectors = {

    // ── Row cascade ─────────────────────────────────────────────────────────

    rows: {
        /** Containers whose first <tr> is a header row. Tried in order. */
        containers: ['table', '[class*="table"]'],

        /** Bare row selectors, tried after every container selector. */
        bareRows: ['tbody tr', 'tr'],

        /** Cells of a row, in document order. */
        cell: 'td, th',
    },

    /** Fixed columnar convention: 0 is an ordinal, 1 the date, 2 the value. */
    columns: {
        date: 1,
        price: 2,
        minCells: 3,
    },

    // ── Pagination ──────────────────────────────────────────────────────────

    pagination: {
        /** Anchors whose visible text may announce the next page. */
        anchor: 'a',
        /** Text signal on such an anchor: "Next", "next »", ">" … */
        textSignal: /next|>|»/i,
        /** Explicit link relations, when the page declares them. */
        relNext: 'a[rel~="next"], link[rel~="next"]',
    },
};

export const DEFAULT_MIN_ROWS = 5;
