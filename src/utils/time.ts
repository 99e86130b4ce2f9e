/** Filesystem-safe, sortable timestamp with millisecond precision. */
export const timestampSlug = (date = new Date()) => date.toISOString().replace(/[:.]/g, "-");
