/**
 * HTTPS download and archive extraction helpers
 */

import * as fs from 'fs/promises';
import * as http from 'http';
import * as https from 'https';
import { createWriteStream, createReadStream } from 'fs';
import { Extract as unzip } from 'unzipper';

export const MAX_REDIRECTS = 5;

/**
 * Download a file from a URL, following up to MAX_REDIRECTS redirects
 */
export async function downloadFile(
  url: string,
  destinationPath: string,
  timeout = 60000,
  redirects = 0
): Promise<void> {
  const client = url.startsWith('http:') ? http : https;

  return new Promise((resolve, reject) => {
    const request = client.get(url, { headers: { 'User-Agent': 'mtk-reset-mcp-server' } }, (response) => {
      const status = response.statusCode ?? 0;

      // Follow redirects
      if ([301, 302, 303, 307, 308].includes(status) && response.headers.location) {
        response.resume();
        if (redirects >= MAX_REDIRECTS) {
          reject(new Error(`Too many redirects downloading ${url}`));
          return;
        }
        const next = new URL(response.headers.location, url).toString();
        downloadFile(next, destinationPath, timeout, redirects + 1).then(resolve, reject);
        return;
      }

      if (status !== 200) {
        response.resume();
        reject(new Error(`Failed to download ${url}: HTTP ${status}`));
        return;
      }

      const fileStream = createWriteStream(destinationPath);
      response.pipe(fileStream);

      response.on('error', (error) => {
        fileStream.destroy();
        fs.unlink(destinationPath).then(
          () => reject(error),
          () => reject(error)
        );
      });

      fileStream.on('finish', () => {
        fileStream.close();
        resolve();
      });

      fileStream.on('error', (error) => {
        fs.unlink(destinationPath).then(
          () => reject(error),
          () => reject(error)
        );
      });
    });

    request.on('error', reject);
    request.setTimeout(timeout, () => {
      request.destroy();
      reject(new Error(`Download timed out: ${url}`));
    });
  });
}

/**
 * Extract a zip file
 */
export async function extractZip(zipPath: string, destination: string): Promise<void> {
  await fs.mkdir(destination, { recursive: true });

  const readStream = createReadStream(zipPath);
  const unzipStream = readStream.pipe(unzip({ path: destination }));

  return new Promise((resolve, reject) => {
    unzipStream.on('close', resolve);
    unzipStream.on('error', reject);
  });
}
