import { promises as fs, createWriteStream } from 'node:fs';
import https from 'node:https';
import http from 'node:http';
import { URL } from 'node:url';
import { pipeline } from 'node:stream/promises';
import tmp from 'tmp';
import { extractErrorMessage } from './errors';

const MAX_REDIRECTS = 5;

tmp.setGracefulCleanup();

function get(
  url: URL,
  options: http.RequestOptions,
  callback: (response: http.IncomingMessage) => void,
): http.ClientRequest {
  return url.protocol === 'https:'
    ? https.get(url, options, callback)
    : http.get(url, options, callback);
}

/**
 * Download a file from URL to destination path, following redirects
 * (archive endpoints typically answer with a 302 to a CDN host).
 */
export async function downloadFile(url: string, dest: string, redirects = 0): Promise<void> {
  const parsedUrl = new URL(url);

  const response = await new Promise<http.IncomingMessage>((resolve, reject) => {
    const request = get(parsedUrl, {}, resolve);
    request.on('error', reject);
  });
  const status = response.statusCode ?? 0;

  if (status >= 300 && status < 400 && response.headers.location) {
    response.resume();
    if (redirects >= MAX_REDIRECTS) {
      throw new Error(`Too many redirects while downloading ${url}`);
    }
    await downloadFile(new URL(response.headers.location, parsedUrl).toString(), dest, redirects + 1);
    return;
  }

  if (status < 200 || status >= 300) {
    response.resume();
    throw new Error(`Download of ${url} failed with HTTP ${status}`);
  }

  try {
    await pipeline(response, createWriteStream(dest));
  } catch (error) {
    await fs.rm(dest, { force: true });
    throw new Error(`Download of ${url} was interrupted: ${extractErrorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * GET a URL and return its status code. The body is discarded.
 */
export async function httpGetStatus(url: string, timeoutMs: number): Promise<number> {
  const parsedUrl = new URL(url);

  return new Promise<number>((resolve, reject) => {
    const request = get(parsedUrl, { timeout: timeoutMs }, (response) => {
      response.resume();
      resolve(response.statusCode ?? 0);
    });
    request.on('timeout', () => {
      request.destroy(new Error(`Request to ${url} timed out after ${timeoutMs}ms`));
    });
    request.on('error', reject);
  });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Create a scratch directory that is removed when the process exits.
 */
export function createScratchDir(prefix: string): string {
  return tmp.dirSync({ prefix, unsafeCleanup: true, keep: false }).name;
}
