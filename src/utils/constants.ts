import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

// Environment Configuration
export const NODE_ENV = process.env.NODE_ENV || 'development';
export const WEBSITE = process.env.WEBSITE || 'pw';

// Crawl Configuration
// Upper bound on pages per run; a listing that never returns an empty page stops here
export const MAX_PAGES = parseInt(process.env.MAX_PAGES || '500', 10);

// Timeout Configuration
export const REQUEST_TIMEOUT_MS = parseInt(process.env.REQUEST_TIMEOUT_MS || '30000', 10);

// Error Handling Configuration
export const MAX_RETRY_ATTEMPTS = parseInt(process.env.MAX_RETRY_ATTEMPTS || '3', 10);
export const RETRY_DELAY_MS = parseInt(process.env.RETRY_DELAY_MS || '1000', 10);

// User Agent Configuration
export const USER_AGENT =
  process.env.USER_AGENT ||
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

export const SCRAPING_HEADERS = {
  'User-Agent': USER_AGENT,
  'Accept-Language': 'en-US,en;q=0.9',
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
};

// MySQL Configuration
export const MYSQL_HOST = process.env.MYSQL_HOST || 'localhost';
export const MYSQL_PORT = parseInt(process.env.MYSQL_PORT || '3306', 10);
export const MYSQL_USER = process.env.MYSQL_USER || 'root';
export const MYSQL_PASSWORD = process.env.MYSQL_PASSWORD || '';
export const MYSQL_DATABASE = process.env.MYSQL_DATABASE || 'grants_dev';
export const MYSQL_SSL = process.env.MYSQL_SSL === 'true';
export const MYSQL_CONNECTION_LIMIT = parseInt(process.env.MYSQL_CONNECTION_LIMIT || '5', 10);
