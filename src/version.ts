/** Kept in step with package.json by hand on release. */
export const TRIAGE_VERSION = '0.1.0';
