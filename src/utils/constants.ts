/**
 * Shared defaults for the CLI, interactive browser and web dashboard
 */

// Relative to the home directory
export const SAFARI_HISTORY_PATH = 'Library/Safari/History.db';

export const CONFIG_DIR_NAME = 'hist';
export const IGNORE_FILE_NAME = 'ignore.txt';

// CLI defaults
export const DEFAULT_HISTORY_LIMIT = 20;
export const DEFAULT_DOMAIN_LIMIT = 10;
export const DEFAULT_PATH_LIMIT = 5;
export const DEFAULT_DAILY_DAYS = 7;
export const DEFAULT_WEB_PORT = 8080;

// Web dashboard
export const WEB_PAGE_SIZE = 50;
export const WEB_DASHBOARD_RECENT_VISITS = 5;
export const WEB_DEFAULT_DAYS = 30;

// Interactive browser
export const DEFAULT_PAGE_SIZE = 15;
export const MIN_PAGE_SIZE = 5;
export const MAX_TITLE_LENGTH = 60;
export const SEPARATOR_WIDTH = 50;

// Text report
export const TITLE_TRUNCATE_LENGTH = 50;
export const BAR_CHART_WIDTH = 20;

// Label for URLs without an extractable host
export const UNKNOWN_DOMAIN = '(unknown)';
export const NO_TITLE = '(no title)';
