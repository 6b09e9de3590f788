import { toNumber } from './logging.js';

export interface ServerConfig {
  port: number;
  host: string;
  jsonBodyLimit: string;
}

export function loadServerConfig(): ServerConfig {
  const port = toNumber(process.env.PORT, 8000);
  if (port < 0 || port > 65535) {
    throw new Error(`PORT must be between 0 and 65535, got ${port}`);
  }

  return {
    port,
    host: process.env.HOST?.trim() || '0.0.0.0',
    jsonBodyLimit: process.env.ENTITY_JSON_BODY_LIMIT?.trim() || '1mb',
  };
}
