/**
 * Image asset library
 * Images anywhere in the store can fill image fields; uploads land under
 * assets/images/ with a random name.
 */

import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { UnsupportedAssetError } from '../errors.js';
import type { Logger } from '../logger.js';
import { noopLogger } from '../logger.js';
import type { ObjectStore } from '../storage/types.js';

export const ASSET_UPLOAD_PREFIX = 'assets/images/';

export const IMAGE_CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
};

export interface Asset {
  key: string;
  /** Site-relative URL for image fields */
  url: string;
  name: string;
  size: number;
  updated: string;
}

export interface AssetLibraryOptions {
  logger?: Logger;
  /** Name for an uploaded file, without extension */
  newName?: () => string;
}

/**
 * Content type for an image filename, or undefined when the extension is not an image
 */
export function imageContentType(filename: string): string | undefined {
  return IMAGE_CONTENT_TYPES[path.extname(filename).toLowerCase()];
}

export class AssetLibrary {
  private logger: Logger;
  private newName: () => string;

  constructor(
    private objects: ObjectStore,
    options: AssetLibraryOptions = {}
  ) {
    this.logger = options.logger ?? noopLogger;
    this.newName = options.newName ?? (() => uuid().replace(/-/g, ''));
  }

  /**
   * Every image in the store, newest first
   */
  async listAssets(): Promise<Asset[]> {
    const objects = await this.objects.list();
    return objects
      .filter((object) => imageContentType(object.key) !== undefined)
      .map((object) => ({
        key: object.key,
        url: `/${object.key}`,
        name: path.posix.basename(object.key),
        size: object.size,
        updated: object.updated,
      }))
      .sort((a, b) => b.updated.localeCompare(a.updated) || a.key.localeCompare(b.key));
  }

  /**
   * Store an image under a fresh name, keeping its extension
   * @throws UnsupportedAssetError for empty files and non-image extensions
   */
  async uploadAsset(filename: string, body: Buffer): Promise<Asset> {
    if (body.length === 0) {
      throw new UnsupportedAssetError('No file provided');
    }
    const contentType = imageContentType(filename);
    if (!contentType) {
      throw new UnsupportedAssetError(
        `File type not allowed: ${filename} (use ${Object.keys(IMAGE_CONTENT_TYPES).join(', ')})`
      );
    }

    const extension = path.extname(filename).toLowerCase();
    const key = `${ASSET_UPLOAD_PREFIX}${this.newName()}${extension}`;
    await this.objects.put(key, body, contentType);
    this.logger.info(`Uploaded ${filename} as ${key}`);

    const [stored] = await this.objects.list(key);
    return {
      key,
      url: `/${key}`,
      name: path.posix.basename(key),
      size: body.length,
      updated: stored?.updated ?? '',
    };
  }
}
