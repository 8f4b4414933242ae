import { createWriteStream } from 'node:fs';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { DownloadError } from '../core/errors.js';
import { extractArchive } from './archive.js';
import { ensureDir, removePath } from './fs.js';

/**
 * Streams `url` into `destDir/fileName`. With `extract`, the archive is
 * unpacked into `destDir` and then deleted.
 */
export async function downloadFile(
  url: string,
  fileName: string,
  destDir: string,
  extract: boolean,
): Promise<string> {
  ensureDir(destDir);
  const dest = join(destDir, fileName);

  let response: Response;
  try {
    response = await fetch(url, { headers: { 'User-Agent': 'espforge' } });
  } catch (err) {
    throw new DownloadError(url, String(err), { cause: err });
  }
  if (!response.ok || !response.body) {
    throw new DownloadError(url, `unexpected HTTP response: ${response.status}`);
  }

  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(dest));
  } catch (err) {
    await removePath(dest);
    throw new DownloadError(url, String(err), { cause: err });
  }

  if (extract) {
    await extractArchive(dest, destDir);
    await removePath(dest);
  }
  return dest;
}
