/**
 * Centralized constants for the RiceXPro expression viewer.
 * The site selectors below mirror the current RiceXPro markup; update them
 * here when the site changes.
 */

// ============================================================================
// Site Integration
// ============================================================================

/**
 * Base URL of the RiceXPro database. The search form lives here and the
 * chart paths on a search hit are relative to it.
 */
export const RICEXPRO_BASE_URL = 'https://ricexpro.dna.affrc.go.jp/RXP_4001/';

/**
 * Text field that takes the gene name.
 */
export const SEARCH_FIELD_SELECTOR = '[name="keyword"]';

/**
 * Submit control of the search form, identified by its label.
 */
export const SEARCH_BUTTON_SELECTOR = 'input[type="submit"][value="Search"]';

/**
 * Element present on the results page only when the search matched.
 */
export const SEARCH_HIT_SELECTOR = '.graph-link';

export const DEV_CHART_ATTRIBUTE = 'dev_barimg';
export const TISSUE_CHART_ATTRIBUTE = 'tissue_barimg';

// ============================================================================
// Timeouts & Browser
// ============================================================================

/**
 * Default timeout for page navigation and image downloads.
 * Can be overridden via RICEXPRO_TIMEOUT_MS environment variable.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Browser channel used when no executable path is configured.
 * `chrome` drives the locally installed Google Chrome.
 */
export const DEFAULT_BROWSER_CHANNEL = 'chrome';

// ============================================================================
// Display
// ============================================================================

/**
 * Frame the combined chart is fitted into before it is shown (25:8).
 */
export const DISPLAY_FRAME = { width: 2500, height: 800 } as const;

export const DISPLAY_FILE_PREFIX = 'ricexpro-';

/**
 * Each shown chart overwrites this file in the output directory.
 */
export const DISPLAY_FILE_NAME = 'ricexpro-profile.png';
