/**
 * CLI configuration.
 *
 * Priority: --db flag > INVOICE_DB_PATH > ./data/invoices.db
 */

const DEFAULT_DB_PATH = "./data/invoices.db";

export interface CliConfig {
  dbPath: string;
}

export function loadConfig(opts: { db?: string } = {}): CliConfig {
  return {
    dbPath: opts.db ?? process.env.INVOICE_DB_PATH ?? DEFAULT_DB_PATH,
  };
}
