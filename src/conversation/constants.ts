/** Shorter search queries are rejected before any engine call */
export const MIN_QUERY_LENGTH = 2;
