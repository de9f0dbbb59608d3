/**
 * Load .env before config and logger read process.env.
 * Must be the first import in index.ts.
 */
import 'dotenv/config'
