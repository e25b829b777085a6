/** Textual representation written to stdout. */
export type OutputFormat = 'json' | 'env' | 'csv'
