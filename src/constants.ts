/** Inactivity gap after which the next page view starts a new session. */
export const SESSION_TIMEOUT_MS = 30 * 60 * 1000;

/** A session counts as a current visitor while its last page view is this recent. */
export const CURRENT_VISITOR_WINDOW_MS = 5 * 60 * 1000;

/** Event type that counts as a page view. */
export const PAGEVIEW_EVENT_TYPE = 'pageview';

/** Source bucket for events without a referrer. */
export const DIRECT_SOURCE = 'Direct/None';

/** Bucket for events with no OS, browser or device information. */
export const UNKNOWN_BUCKET = 'Unknown';
