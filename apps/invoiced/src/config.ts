/**
 * invoiced configuration.
 * All env access centralized here — no direct process.env elsewhere.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("INVOICED_PORT", "3110"), 10),
  host: env("INVOICED_HOST", "0.0.0.0"),
  /** SQLite file holding the invoice buckets. */
  dbPath: env("INVOICE_DB_PATH", "./data/invoices.db"),
  /** pino level: trace|debug|info|warn|error|fatal|silent. */
  logLevel: env("LOG_LEVEL", "info"),
} as const;
