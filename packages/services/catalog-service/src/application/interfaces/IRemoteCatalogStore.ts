/**
 * Hierarchical blob store holding the catalog as `Artist/<artist>/<album>/<file>`.
 * Implementations classify their failures as CatalogError at the point of failure.
 */

export interface CatalogListing {
  /** Child "directories", full paths ending with `/` */
  prefixes: string[];
  /** Leaf blobs directly under the path, full paths */
  items: string[];
}

export interface IRemoteCatalogStore {
  readonly providerName: string;
  listChildren(path: string): Promise<CatalogListing>;
  /** Time-limited signed URL for a blob */
  getDownloadUrl(blobPath: string): Promise<string>;
}
