/**
 * GoFile Uploader
 *
 * Upload to GoFile via its HTTP API.
 * Docs: https://gofile.io/api
 *
 * Flow:
 *   GET  https://api.gofile.io/servers          → pick the first server
 *   POST https://<server>.gofile.io/uploadFile  → multipart file (+ token)
 */

import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';
import { FormData, request, type Dispatcher } from 'undici';
import { createLogger, isObject, isString, type Logger } from '@trackdrop/utils';
import type { UploadProgressCallback, UploadResult, Uploader } from '../types.js';

export interface GofileConfig {
  /** Account token; anonymous uploads when unset */
  token?: string;
  apiUrl: string;
  /** Upload requests can take a long time for large archives */
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class GofileUploader implements Uploader {
  readonly name = 'gofile';
  private config: GofileConfig;
  private logger: Logger;

  constructor(config?: Partial<GofileConfig>, logger?: Logger) {
    this.config = {
      token: config?.token,
      apiUrl: config?.apiUrl ?? 'https://api.gofile.io',
      timeoutMs: config?.timeoutMs ?? 30 * 60 * 1000,
      dispatcher: config?.dispatcher,
    };
    this.logger = logger ?? createLogger({ component: 'gofile' });
  }

  async upload(filePath: string, onProgress?: UploadProgressCallback): Promise<UploadResult> {
    try {
      onProgress?.(10, 'Getting upload server...');
      const server = await this.getServer();
      if (!server) {
        return { success: false, error: 'No upload server available' };
      }

      onProgress?.(25, 'Uploading to cloud storage...');
      const form = new FormData();
      form.append('file', await openAsBlob(filePath), basename(filePath));
      if (this.config.token) {
        form.append('token', this.config.token);
      }

      const { statusCode, body } = await request(`https://${server}.gofile.io/uploadFile`, {
        method: 'POST',
        body: form,
        dispatcher: this.config.dispatcher,
        headersTimeout: this.config.timeoutMs,
        bodyTimeout: this.config.timeoutMs,
      });
      const payload: unknown = await body.json();

      const link = extractDownloadPage(payload);
      if (statusCode !== 200 || !link) {
        this.logger.warn({ statusCode, payload }, 'GoFile upload rejected');
        return { success: false, error: `Upload rejected with status ${statusCode}` };
      }

      onProgress?.(100, 'Upload complete');
      this.logger.info({ filePath, link }, 'Uploaded to GoFile');
      return { success: true, link };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ filePath, error: message }, 'GoFile upload failed');
      return { success: false, error: message };
    }
  }

  private async getServer(): Promise<string | null> {
    const { statusCode, body } = await request(`${this.config.apiUrl}/servers`, {
      method: 'GET',
      dispatcher: this.config.dispatcher,
    });
    const payload: unknown = await body.json();

    if (statusCode !== 200) {
      this.logger.warn({ statusCode, payload }, 'GoFile server lookup failed');
      return null;
    }
    return extractServerName(payload);
  }
}

function okData(payload: unknown): Record<string, unknown> | null {
  if (!isObject(payload) || payload['status'] !== 'ok' || !isObject(payload['data'])) {
    return null;
  }
  return payload['data'];
}

export function extractServerName(payload: unknown): string | null {
  const servers = okData(payload)?.['servers'];
  if (!Array.isArray(servers)) {
    return null;
  }
  const entries: unknown[] = servers;
  const first = entries[0];
  return isObject(first) && isString(first['name']) ? first['name'] : null;
}

export function extractDownloadPage(payload: unknown): string | null {
  const page = okData(payload)?.['downloadPage'];
  return isString(page) ? page : null;
}
