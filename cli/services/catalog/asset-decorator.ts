import fs from 'fs-extra';
import path from 'path';
import { PathResolver } from '../../../src/lib/paths';
import { CatalogSettings } from '../../lib/config';
import { DecoratedAsset, MediaAsset, UNKNOWN_VALUE, extensionOf } from '../../lib/media-types';

const VIDEO_THUMB_EXTENSIONS = ['.jpg', '.png'];

/**
 * Adds servable paths, a thumbnail and the viewable flag to catalog rows.
 * Returned paths are relative to the depot root.
 */
export class AssetDecorator {
  private readonly imageTypes: Set<string>;
  private readonly videoTypes: Set<string>;

  constructor(
    private readonly resolver: PathResolver,
    private readonly thumbnails: CatalogSettings['thumbnails'],
    viewable: CatalogSettings['viewable']
  ) {
    this.imageTypes = new Set(viewable.images);
    this.videoTypes = new Set(viewable.videos);
  }

  decorate(asset: MediaAsset): DecoratedAsset {
    const absolutePath = this.resolver.expand(asset.file_path);
    const type = this.typeOf(asset);
    return {
      ...asset,
      absolutePath,
      relativePath: this.resolver.depotRelative(absolutePath),
      thumbnailPath: this.thumbnailFor(absolutePath, type),
      viewable: this.isViewable(type),
    };
  }

  decorateAll(assets: MediaAsset[]): DecoratedAsset[] {
    return assets.map(asset => this.decorate(asset));
  }

  isViewable(type: string): boolean {
    return this.imageTypes.has(type) || this.videoTypes.has(type);
  }

  private typeOf(asset: MediaAsset): string {
    const stored = asset.file_type.toLowerCase();
    if (stored && stored !== UNKNOWN_VALUE) return stored;
    return extensionOf(asset.file_path);
  }

  private thumbnailFor(absolutePath: string, type: string): string {
    if (this.imageTypes.has(type)) {
      return this.resolver.depotRelative(absolutePath);
    }

    if (this.videoTypes.has(type)) {
      const parsed = path.parse(absolutePath);
      for (const extension of VIDEO_THUMB_EXTENSIONS) {
        const candidate = path.join(parsed.dir, `${parsed.name}${extension}`);
        if (fs.existsSync(candidate)) return this.resolver.depotRelative(candidate);
      }
      return this.iconPath(this.thumbnails.generic);
    }

    const icon = this.thumbnails.icons[type];
    return this.iconPath(icon ?? this.thumbnails.generic);
  }

  private iconPath(icon: string): string {
    return path.posix.join(this.thumbnails.directory, icon);
  }
}
