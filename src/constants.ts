/** Default viewport (px), a narrow mobile screen */
export const DEFAULT_VIEWPORT_W = 390;
export const DEFAULT_VIEWPORT_H = 844;

/** Minimum IoU for two detected blocks to count as overlapping */
export const DEFAULT_IOU_THRESHOLD = 0.1;

/** Minimum detector confidence for an object to be kept */
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

/** Default number of rewrite iterations per page */
export const MAX_ITER = 3;

/** Bounds accepted by the generation request */
export const MIN_PAGES = 1;
export const MAX_PAGES = 10;
export const MIN_CORRECTION_ITER = 1;
export const MAX_CORRECTION_ITER = 10;

/** Hex characters kept from the SHA-256 site digest */
export const SITE_HASH_LENGTH = 16;

/** Wait after network idle before a page is measured and captured (ms) */
export const RENDER_SETTLE_MS = 1000;

/** Upper bound on any single collaborator call (ms) */
export const COLLABORATOR_TIMEOUT_MS = 120_000;

/** Pages corrected in parallel within one generation run */
export const PAGE_CONCURRENCY = 2;

/** CSS class the generated markup puts on every positioned content block */
export const BLOCK_CLASS = "block";

/** Style properties that place a block on the page */
export const BLOCK_POSITION_PROPS = ["left", "top", "width", "height"] as const;

/** Reported by the health endpoint */
export const SERVICE_VERSION = "0.1.0";

/** Largest accepted request body (bytes), sized for full-page screenshots */
export const BODY_LIMIT_BYTES = 20 * 1024 * 1024;
