/**
 * Image Dimension Resolution
 *
 * Works out the pixel size to put on media nodes from the explicit
 * width/height attributes and, when those are incomplete, from the image
 * itself. Probing goes through `ImageProber` so remote images can be
 * fetched ahead of the synchronous conversion.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { imageSize } from 'image-size';
import type { Logger } from './logger.js';
import type { Dimensions } from './types.js';

export interface ImageProber {
  /** Size of the image at a local path or http(s) URL, if it can be read */
  probe(location: string): Dimensions | undefined;
}

export interface ImageRequest {
  target: string;
  width?: string;
  height?: string;
  imagesDir?: string;
  baseDir?: string;
}

export interface ResolveOptions {
  /** Skip the warning on failure (inline images) */
  quiet?: boolean;
}

export function isRemoteImage(target: string): boolean {
  return /^https?:\/\//i.test(target);
}

/**
 * Parse an explicit dimension attribute. Accepts leading digits ("200", "200px").
 */
export function parseDimension(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Reads local files with image-size. Remote sizes must be supplied with
 * `remember()`; asking for an unknown URL records it in `pendingRemote`.
 */
export class FileImageProber implements ImageProber {
  private readonly remoteSizes = new Map<string, Dimensions | null>();
  private readonly pending = new Set<string>();

  probe(location: string): Dimensions | undefined {
    if (isRemoteImage(location)) {
      const known = this.remoteSizes.get(location);
      if (known === undefined) {
        this.pending.add(location);
        return undefined;
      }
      return known ?? undefined;
    }

    const size = imageSize(location);
    if (size.width === undefined || size.height === undefined) {
      return undefined;
    }
    return { width: size.width, height: size.height };
  }

  /** Record the size of a remote image; null marks a failed fetch */
  remember(url: string, dimensions: Dimensions | null): void {
    this.remoteSizes.set(url, dimensions);
    this.pending.delete(url);
  }

  get pendingRemote(): string[] {
    return [...this.pending];
  }
}

export class ImageDimensionResolver {
  constructor(
    private readonly prober: ImageProber,
    private readonly logger: Logger
  ) {}

  /**
   * Resolve dimensions for an image. Returns an empty object when nothing
   * is known.
   */
  resolve(request: ImageRequest, options: ResolveOptions = {}): Partial<Dimensions> {
    const width = parseDimension(request.width);
    const height = parseDimension(request.height);

    if (width !== undefined && height !== undefined) {
      return { width, height };
    }

    const probed = this.probe(request, options.quiet ?? false);
    if (probed === undefined) {
      return compact({ width, height });
    }

    if (width !== undefined) {
      return { width, height: Math.round((width * probed.height) / probed.width) };
    }
    if (height !== undefined) {
      return { width: Math.round((height * probed.width) / probed.height), height };
    }
    return probed;
  }

  /**
   * Local paths tried for a target, in order
   */
  searchPaths(request: ImageRequest): string[] {
    const baseDir = request.baseDir ?? process.cwd();
    const paths: string[] = [];
    if (request.imagesDir !== undefined && request.imagesDir.length > 0) {
      paths.push(resolve(baseDir, request.imagesDir, request.target));
    }
    paths.push(resolve(baseDir, request.target));
    return paths;
  }

  private probe(request: ImageRequest, quiet: boolean): Dimensions | undefined {
    if (isRemoteImage(request.target)) {
      return this.probeLocation(request.target, quiet);
    }

    const paths = this.searchPaths(request);
    const found = paths.find(path => existsSync(path));
    if (found === undefined) {
      if (!quiet) {
        this.logger.warn(`Image not found: ${request.target} (searched: ${paths.join(', ')})`);
      }
      return undefined;
    }
    return this.probeLocation(found, quiet);
  }

  private probeLocation(location: string, quiet: boolean): Dimensions | undefined {
    try {
      const size = this.prober.probe(location);
      if (size === undefined || size.width <= 0 || size.height <= 0) {
        return undefined;
      }
      return size;
    } catch (error) {
      if (!quiet) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Could not read image dimensions for ${location}: ${reason}`);
      }
      return undefined;
    }
  }
}

function compact(dimensions: { width?: number; height?: number }): Partial<Dimensions> {
  const result: Partial<Dimensions> = {};
  if (dimensions.width !== undefined) result.width = dimensions.width;
  if (dimensions.height !== undefined) result.height = dimensions.height;
  return result;
}
