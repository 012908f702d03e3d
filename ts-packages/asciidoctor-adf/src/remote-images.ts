/**
 * Remote Image Sizes
 *
 * Downloads images the conversion could not size and records their
 * dimensions on the prober for the next pass.
 */

import type { AxiosInstance } from 'axios';
import { imageSize } from 'image-size';
import type { FileImageProber, Logger } from '@asciidoc-adf/document';

async function fetchOne(url: string, prober: FileImageProber, http: AxiosInstance, logger: Logger): Promise<void> {
  try {
    const response = await http.get<ArrayBuffer>(url, { responseType: 'arraybuffer', validateStatus: () => true });
    if (response.status !== 200) {
      logger.warn(`Could not fetch image ${url}: HTTP ${response.status}`);
      prober.remember(url, null);
      return;
    }
    const size = imageSize(Buffer.from(response.data));
    if (size.width === undefined || size.height === undefined) {
      logger.warn(`Could not read image dimensions for ${url}: unknown size`);
      prober.remember(url, null);
      return;
    }
    prober.remember(url, { width: size.width, height: size.height });
  } catch (error) {
    logger.warn(`Could not read image dimensions for ${url}: ${error instanceof Error ? error.message : String(error)}`);
    prober.remember(url, null);
  }
}

export async function fetchImageDimensions(
  urls: string[],
  prober: FileImageProber,
  http: AxiosInstance,
  logger: Logger
): Promise<void> {
  await Promise.all(urls.map(url => fetchOne(url, prober, http, logger)));
}
