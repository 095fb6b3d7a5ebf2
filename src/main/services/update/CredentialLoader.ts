import fs from 'node:fs';
import type { AppLogger } from '@main/services/logging/Logger';

export const MAX_TOKEN_FILE_BYTES = 10_000;

interface CredentialLoaderOptions {
  filePath: string;
  logger: AppLogger;
  maxBytes?: number;
}

export class CredentialLoader {
  private readonly filePath: string;
  private readonly logger: AppLogger;
  private readonly maxBytes: number;

  constructor(options: CredentialLoaderOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger;
    this.maxBytes = options.maxBytes ?? MAX_TOKEN_FILE_BYTES;
  }

  loadToken(): string | null {
    let size: number;
    try {
      size = fs.statSync(this.filePath).size;
    } catch {
      this.logger.info('update.credentials.file_missing', { filePath: this.filePath });
      return null;
    }

    if (size <= 0 || size > this.maxBytes) {
      this.logger.warn('update.credentials.invalid_size', { filePath: this.filePath, size, maxBytes: this.maxBytes });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      this.logger.warn('update.credentials.parse_failed', {
        filePath: this.filePath,
        reason: error instanceof Error ? error.message : String(error)
      });
      return null;
    }

    const token = readTokenField(parsed);
    if (!token) {
      this.logger.debug('update.credentials.field_missing', { filePath: this.filePath });
      return null;
    }

    this.logger.info('update.credentials.loaded', { filePath: this.filePath });
    return token;
  }
}

function readTokenField(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || !('github_token' in value)) {
    return null;
  }

  const token = value.github_token;
  if (typeof token !== 'string') {
    return null;
  }

  const normalized = token.trim();
  return normalized.length > 0 ? normalized : null;
}
